import type { GraphConfig } from "./config";
import type { ContactNode, NodeStyle } from "./types";

export interface SearchResult {
	matchedId: string | null;
	styles: Map<string, NodeStyle>;
}

/** Reads a leading integer the way the page's search box does. */
export const parseCaseQuery = (text: string): number | null => {
	const value = Number.parseInt(text, 10);
	return Number.isNaN(value) ? null : value;
};

export const resetStyles = (
	nodes: ContactNode[],
	config: GraphConfig
): Map<string, NodeStyle> =>
	new Map(
		nodes.map(node => [node.id, { alpha: node.alpha, size: config.node.size }])
	);

export const searchCase = (
	nodes: ContactNode[],
	query: string,
	config: GraphConfig,
	current: Map<string, NodeStyle> = resetStyles(nodes, config)
): SearchResult => {
	const caseNumber = parseCaseQuery(query);
	const matched =
		caseNumber === null
			? undefined
			: nodes.find(node => node.caseNumber === caseNumber);

	if (!matched) {
		return { matchedId: null, styles: current };
	}

	const { node } = config;
	return {
		matchedId: matched.id,
		styles: new Map(
			nodes.map(n => [
				n.id,
				n.id === matched.id
					? { alpha: node.selectedAlpha, size: node.selectedSize }
					: { alpha: node.unselectedAlpha, size: node.size },
			])
		),
	};
};
