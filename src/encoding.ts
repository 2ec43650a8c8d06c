import type { GraphConfig } from "./config";
import {
	CONTACT_EDGE,
	type ContactLink,
	type ContactNode,
	type EdgeType,
	type NodeRecord,
	type TabSpec,
} from "./types";

const MS_PER_DAY = 24 * 60 * 60 * 1000;

const toUtcDay = (isoDate: string) =>
	Date.UTC(
		Number(isoDate.slice(0, 4)),
		Number(isoDate.slice(5, 7)) - 1,
		Number(isoDate.slice(8, 10))
	);

/** Whole calendar days from `from` to `to`; negative when `from` is later. */
export const daysBetween = (from: string, to: string): number =>
	Math.round((toUtcDay(to) - toUtcDay(from)) / MS_PER_DAY);

export const recencyAlpha = (days: number, config: GraphConfig): number => {
	const { windowDays, oldestAlpha } = config.recency;
	if (days < 0 || days > windowDays) return 1;
	return 1 - ((1 - oldestAlpha) * days) / windowDays;
};

export const encodeNode = (
	record: NodeRecord,
	reportDate: string,
	config: GraphConfig
): ContactNode => {
	const base = {
		...record,
		size: config.node.size,
		daysSince:
			record.testDate === null
				? null
				: daysBetween(record.testDate, reportDate),
	};

	if (record.caseNumber === null) {
		return {
			...base,
			color: config.colors.other,
			alpha: 1,
			labeled: false,
			recent: false,
		};
	}

	// a case without a test date is treated as positive today
	if (base.daysSince === null) {
		return {
			...base,
			color: config.colors.positive,
			alpha: 1,
			labeled: true,
			recent: true,
		};
	}

	const recent =
		base.daysSince >= 0 && base.daysSince <= config.recency.windowDays;
	return {
		...base,
		color: recent ? config.colors.positive : config.colors.other,
		alpha: recent ? recencyAlpha(base.daysSince, config) : 1,
		labeled: recent,
		recent,
	};
};

export const edgeWeight = (type: EdgeType, config: GraphConfig): number =>
	type === CONTACT_EDGE
		? config.edges.contactWeight
		: config.edges.membershipWeight;

export const edgeDash = (link: ContactLink, config: GraphConfig): number[] =>
	link.membership ? config.edges.membershipDash : [];

export const groupDisplayName = (group: string, config: GraphConfig) =>
	config.groupDisplayNames[group] ?? group;

export const buildTabs = (
	title: string,
	groups: string[],
	config: GraphConfig
): TabSpec[] => {
	const { tabs } = config;
	const tab = (
		name: string,
		contactAlpha: number,
		membershipAlpha: number,
		group: string | null
	): TabSpec => ({
		name,
		title: `${title}:  ${name}`,
		contactAlpha,
		membershipAlpha,
		group,
	});

	return [
		tab("All", tabs.all.contact, tabs.all.membership, null),
		tab(
			"Contact Traces",
			tabs.contactTraces.contact,
			tabs.contactTraces.membership,
			null
		),
		tab("Groups", tabs.groups.contact, tabs.groups.membership, null),
		...groups.map(group =>
			tab(
				groupDisplayName(group, config),
				tabs.perGroup.contact,
				tabs.perGroup.membership,
				group
			)
		),
	];
};

export const tabEdgeAlpha = (tab: TabSpec, link: ContactLink): number => {
	if (!link.membership) return tab.contactAlpha;
	if (tab.group !== null && tab.group !== link.type) return 0;
	return tab.membershipAlpha;
};

export const reportTitle = (date: string) =>
	`${date} Contact Tracing Visualization`;
