import { describe, expect, it } from "vitest";
import { CONFIG } from "./config";
import {
	buildTabs,
	daysBetween,
	edgeDash,
	edgeWeight,
	encodeNode,
	recencyAlpha,
	tabEdgeAlpha,
} from "./encoding";
import type { ContactLink, NodeRecord } from "./types";

const record = (overrides: Partial<NodeRecord> = {}): NodeRecord => ({
	id: "a",
	caseNumber: null,
	testDate: null,
	groups: {},
	attributes: {},
	...overrides,
});

const link = (overrides: Partial<ContactLink> = {}): ContactLink => ({
	source: "a",
	target: "b",
	type: "contact",
	membership: false,
	weight: 1,
	attributes: {},
	...overrides,
});

describe("daysBetween", () => {
	it("counts calendar days across month boundaries", () => {
		expect(daysBetween("2021-02-26", "2021-03-02")).toBe(4);
		expect(daysBetween("2021-03-14", "2021-03-14")).toBe(0);
	});

	it("is negative when the first date is later", () => {
		expect(daysBetween("2021-03-15", "2021-03-14")).toBe(-1);
	});

	it("ignores daylight saving shifts", () => {
		expect(daysBetween("2021-03-13", "2021-03-15")).toBe(2);
		expect(daysBetween("2021-11-06", "2021-11-08")).toBe(2);
	});
});

describe("recencyAlpha", () => {
	it("ramps from 1 today to 0.5 at the end of the window", () => {
		expect(recencyAlpha(0, CONFIG)).toBe(1);
		expect(recencyAlpha(7, CONFIG)).toBe(0.75);
		expect(recencyAlpha(14, CONFIG)).toBe(0.5);
	});

	it("is 1 outside the window", () => {
		expect(recencyAlpha(15, CONFIG)).toBe(1);
		expect(recencyAlpha(-2, CONFIG)).toBe(1);
	});
});

describe("encodeNode", () => {
	const reportDate = "2021-03-14";

	it("colors a recent case red with a faded alpha and a label", () => {
		const node = encodeNode(
			record({ caseNumber: 7, testDate: "2021-03-07" }),
			reportDate,
			CONFIG
		);
		expect(node).toMatchObject({
			color: "#DC0000",
			alpha: 0.75,
			size: 9,
			labeled: true,
			recent: true,
			daysSince: 7,
		});
	});

	it("treats a case without a test date as positive today", () => {
		const node = encodeNode(record({ caseNumber: 7 }), reportDate, CONFIG);
		expect(node).toMatchObject({
			color: "#DC0000",
			alpha: 1,
			labeled: true,
			daysSince: null,
		});
	});

	it("colors an old case like everyone else", () => {
		const node = encodeNode(
			record({ caseNumber: 7, testDate: "2021-02-01" }),
			reportDate,
			CONFIG
		);
		expect(node).toMatchObject({
			color: "#65ADFF",
			alpha: 1,
			labeled: false,
			recent: false,
			daysSince: 41,
		});
	});

	it("does not count a test dated after the report", () => {
		const node = encodeNode(
			record({ caseNumber: 7, testDate: "2021-03-20" }),
			reportDate,
			CONFIG
		);
		expect(node.color).toBe("#65ADFF");
		expect(node.daysSince).toBe(-6);
	});

	it("leaves people without a case blue", () => {
		const node = encodeNode(
			record({ testDate: "2021-03-13" }),
			reportDate,
			CONFIG
		);
		expect(node).toMatchObject({ color: "#65ADFF", alpha: 1, labeled: false });
	});
});

describe("edge styling", () => {
	it("weights contacts above memberships", () => {
		expect(edgeWeight("contact", CONFIG)).toBe(1);
		expect(edgeWeight("group_2", CONFIG)).toBe(0.05);
	});

	it("dashes membership edges only", () => {
		expect(edgeDash(link(), CONFIG)).toEqual([]);
		expect(
			edgeDash(link({ type: "group_1", membership: true }), CONFIG)
		).toEqual([5, 5]);
	});
});

describe("buildTabs", () => {
	it("takes the per-group alphas from the configuration", () => {
		const [, , , chapter] = buildTabs("Report", ["group_1"], {
			...CONFIG,
			tabs: { ...CONFIG.tabs, perGroup: { contact: 0.3, membership: 0.6 } },
		});

		expect(chapter).toEqual({
			name: "group_1",
			title: "Report:  group_1",
			contactAlpha: 0.3,
			membershipAlpha: 0.6,
			group: "group_1",
		});
	});


	const tabs = buildTabs("2021-03-14 Contact Tracing Visualization", ["group_1", "group_2"], {
		...CONFIG,
		groupDisplayNames: { group_1: "Chapter" },
	});

	it("lists the fixed tabs then one per group", () => {
		expect(tabs.map(tab => tab.name)).toEqual([
			"All",
			"Contact Traces",
			"Groups",
			"Chapter",
			"group_2",
		]);
		expect(tabs[1].title).toBe(
			"2021-03-14 Contact Tracing Visualization:  Contact Traces"
		);
	});

	it("filters edges per tab", () => {
		const contact = link();
		const chapter = link({ type: "group_1", membership: true });
		const team = link({ type: "group_2", membership: true });

		expect(tabs.map(tab => tabEdgeAlpha(tab, contact))).toEqual([
			1, 1, 0, 0, 0,
		]);
		expect(tabs.map(tab => tabEdgeAlpha(tab, chapter))).toEqual([
			0.1, 0, 0.2, 0.2, 0,
		]);
		expect(tabs.map(tab => tabEdgeAlpha(tab, team))).toEqual([
			0.1, 0, 0.2, 0, 0.2,
		]);
	});
});
