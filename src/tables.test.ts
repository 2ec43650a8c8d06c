import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { ContactGraphError } from "./errors";
import {
	parseEdgeTable,
	parseNodeTable,
	readTables,
	toIsoDate,
} from "./tables";

const GROUPS = ["group_1", "group_2", "group_3"];
const thrown = (fn: () => unknown): unknown => {
	try {
		fn();
	} catch (err) {
		return err;
	}
	return undefined;
};

const fixture = (name: string) =>
	fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));

describe("toIsoDate", () => {
	it("keeps the calendar date of a datetime", () => {
		expect(toIsoDate("2021-03-10")).toBe("2021-03-10");
		expect(toIsoDate("2021-03-10 00:00:00")).toBe("2021-03-10");
		expect(toIsoDate("2021-03-10T08:30:00Z")).toBe("2021-03-10");
	});

	it("rejects impossible dates", () => {
		expect(toIsoDate("2021-02-30")).toBeNull();
		expect(toIsoDate("03/10/2021")).toBeNull();
	});
});

describe("parseNodeTable", () => {
	it("takes a blank first header as the id column", () => {
		const nodes = parseNodeTable(
			",case,date,group_1,building\n7,12,2021-03-01,chapter-a,North Hall\n",
			GROUPS
		);

		expect(nodes).toEqual([
			{
				id: "7",
				caseNumber: 12,
				testDate: "2021-03-01",
				groups: { group_1: "chapter-a" },
				attributes: { building: "North Hall" },
			},
		]);
	});

	it("accepts an explicit id column and empty cells", () => {
		const nodes = parseNodeTable("id,case,date,group_1\na,,,\n", GROUPS);
		expect(nodes).toEqual([
			{
				id: "a",
				caseNumber: null,
				testDate: null,
				groups: {},
				attributes: {},
			},
		]);
	});

	it("reads float-formatted case numbers", () => {
		const [node] = parseNodeTable("id,case\na,103.0\n", GROUPS);
		expect(node.caseNumber).toBe(103);
	});

	it("rejects a non-numeric case", () => {
		expect(() => parseNodeTable("id,case\na,abc\n", GROUPS)).toThrow(
			'Invalid nodes row 1: case: case "abc" is not an integer'
		);
	});

	it("rejects a malformed date", () => {
		expect(() =>
			parseNodeTable("id,date\na,2021-03-01\nb,tomorrow\n", GROUPS)
		).toThrow('Invalid nodes row 2: date: date "tomorrow" is not a YYYY-MM-DD date');
	});

	it("rejects duplicate ids", () => {
		const error = thrown(() => parseNodeTable("id\na\na\n", GROUPS));
		expect(error).toBeInstanceOf(ContactGraphError);
		expect(error).toMatchObject({
			code: "INVALID_TABLE",
			message: 'Invalid nodes row 2: duplicate id "a"',
		});
	});

	it("reads missing trailing cells as empty", () => {
		const [node] = parseNodeTable("id,case,group_1,group_2\na,1,x\n", GROUPS);

		expect(node.caseNumber).toBe(1);
		expect(node.groups).toEqual({ group_1: "x" });
		expect(node.attributes).toEqual({});
	});

	it("rejects rows with too many fields", () => {
		expect(() => parseNodeTable("id,case\na,1,extra\n", GROUPS)).toThrow(
			ContactGraphError
		);
	});
});

describe("parseEdgeTable", () => {
	it("keeps extra columns as attributes", () => {
		expect(
			parseEdgeTable(",source,target,date\n0,a,b,2021-03-09\n")
		).toEqual([
			{ source: "a", target: "b", attributes: { date: "2021-03-09" } },
		]);
	});

	it("returns no edges for a header-only table", () => {
		expect(parseEdgeTable("source,target\n")).toEqual([]);
	});

	it("requires both endpoints", () => {
		expect(() => parseEdgeTable("source,target\na,\n")).toThrow(
			"Invalid edges row 1: target: target is required"
		);
	});
});

describe("readTables", () => {
	it("loads the fixture tables", async () => {
		const { nodes, edges } = await readTables(
			fixture("nodes.csv"),
			fixture("edges.csv"),
			GROUPS
		);

		expect(nodes.map(node => node.id)).toEqual(["0", "1", "2", "3", "4"]);
		expect(nodes[2]).toEqual({
			id: "2",
			caseNumber: 102,
			testDate: "2021-02-01",
			groups: { group_2: "soccer" },
			attributes: {
				test_date: "2021-02-01",
				building: "South Hall",
				notes: "older case",
			},
		});
		expect(edges).toHaveLength(3);
	});

	it("reports a missing file as an IO error", async () => {
		await expect(
			readTables(fixture("nodes.csv"), fixture("missing.csv"), GROUPS)
		).rejects.toMatchObject({ code: "IO" });
	});
});
