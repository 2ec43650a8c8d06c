import type { GraphConfig } from "./config";
import { ContactGraphError } from "./errors";
import { edgeWeight, encodeNode } from "./encoding";
import {
	CONTACT_EDGE,
	type ContactGraph,
	type ContactLink,
	type EdgeRecord,
	type NodeRecord,
} from "./types";

export interface BuildOptions {
	/** ISO date the recency window is measured back from. */
	reportDate: string;
	config: GraphConfig;
	groups?: string[];
}

export type RestrictMode = "within" | "adjacent";

export interface RestrictOptions {
	column: string;
	value: string;
	mode: RestrictMode;
}

/** Order-independent key for the undirected pair; ids may hold any character. */
export const edgeKey = (a: string, b: string) =>
	JSON.stringify(a < b ? [a, b] : [b, a]);

export const hasEdge = (keys: Set<string>, a: string, b: string) =>
	keys.has(edgeKey(a, b));

const membersByValue = (nodes: NodeRecord[], group: string) => {
	const members = new Map<string, string[]>();
	nodes.forEach(node => {
		const value = node.groups[group];
		if (value === undefined || value === "") return;
		if (!members.has(value)) members.set(value, []);
		members.get(value)?.push(node.id);
	});
	return members;
};

export const buildContactGraph = (
	records: NodeRecord[],
	edges: EdgeRecord[],
	{ reportDate, config, groups = config.groups }: BuildOptions
): ContactGraph => {
	const ids = new Set(records.map(record => record.id));
	const keys = new Set<string>();
	const links: ContactLink[] = [];
	let droppedSelfLoops = 0;

	edges.forEach((edge, index) => {
		[edge.source, edge.target].forEach(id => {
			if (!ids.has(id)) {
				throw new ContactGraphError(
					"UNKNOWN_NODE",
					`Edge ${index + 1} references unknown node "${id}"`
				);
			}
		});

		if (edge.source === edge.target) {
			droppedSelfLoops++;
			return;
		}
		if (hasEdge(keys, edge.source, edge.target)) return;

		keys.add(edgeKey(edge.source, edge.target));
		links.push({
			source: edge.source,
			target: edge.target,
			type: CONTACT_EDGE,
			membership: false,
			weight: edgeWeight(CONTACT_EDGE, config),
			attributes: edge.attributes,
		});
	});
	const contactEdges = links.length;

	groups.forEach(group => {
		membersByValue(records, group).forEach(members => {
			if (members.length < 2) return;
			for (let i = 0; i < members.length; i++) {
				for (let j = i + 1; j < members.length; j++) {
					if (hasEdge(keys, members[i], members[j])) continue;
					keys.add(edgeKey(members[i], members[j]));
					links.push({
						source: members[i],
						target: members[j],
						type: group,
						membership: true,
						weight: edgeWeight(group, config),
						attributes: {},
					});
				}
			}
		});
	});

	return {
		nodes: records.map(record => encodeNode(record, reportDate, config)),
		links,
		groups,
		summary: {
			contactEdges,
			membershipEdges: links.length - contactEdges,
			droppedSelfLoops,
		},
	};
};

/**
 * Limits the population to one group. "within" keeps only edges inside the
 * group; "adjacent" also keeps edges leaving it, and the nodes they reach.
 */
export const restrictToGroup = (
	nodes: NodeRecord[],
	edges: EdgeRecord[],
	{ column, value, mode }: RestrictOptions
): { nodes: NodeRecord[]; edges: EdgeRecord[] } => {
	const members = new Set(
		nodes
			.filter(
				node =>
					(node.groups[column] ?? node.attributes[column]) === value
			)
			.map(node => node.id)
	);

	const keptEdges = edges.filter(edge =>
		mode === "within"
			? members.has(edge.source) && members.has(edge.target)
			: members.has(edge.source) || members.has(edge.target)
	);

	const keptIds = new Set(members);
	if (mode === "adjacent") {
		keptEdges.forEach(edge => {
			keptIds.add(edge.source);
			keptIds.add(edge.target);
		});
	}

	return {
		nodes: nodes.filter(node => keptIds.has(node.id)),
		edges: keptEdges,
	};
};
