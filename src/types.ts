export interface NodeRecord {
	id: string;
	caseNumber: number | null;
	/** ISO calendar date (YYYY-MM-DD) of the positive test. */
	testDate: string | null;
	groups: Record<string, string>;
	attributes: Record<string, string>;
}

export interface EdgeRecord {
	source: string;
	target: string;
	attributes: Record<string, string>;
}

/** "contact" for a traced contact, otherwise the group column the pair shares. */
export type EdgeType = string;

export const CONTACT_EDGE: EdgeType = "contact";

export interface ContactNode extends NodeRecord {
	color: string;
	alpha: number;
	size: number;
	labeled: boolean;
	recent: boolean;
	daysSince: number | null;
}

export interface ContactLink {
	source: string;
	target: string;
	type: EdgeType;
	membership: boolean;
	weight: number;
	attributes: Record<string, string>;
}

export interface GraphSummary {
	contactEdges: number;
	membershipEdges: number;
	droppedSelfLoops: number;
}

export interface ContactGraph {
	nodes: ContactNode[];
	links: ContactLink[];
	groups: string[];
	summary: GraphSummary;
}

export interface Position {
	x: number;
	y: number;
}

export interface TabSpec {
	name: string;
	title: string;
	contactAlpha: number;
	membershipAlpha: number;
	group: string | null;
}

export interface NodeStyle {
	alpha: number;
	size: number;
}
