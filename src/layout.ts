import {
	forceLink,
	forceManyBody,
	forceSimulation,
	forceX,
	forceY,
	type SimulationLinkDatum,
	type SimulationNodeDatum,
} from "d3-force";
import { randomLcg } from "d3-random";
import type { GraphConfig } from "./config";
import type { ContactGraph, Position } from "./types";

interface LayoutNode extends SimulationNodeDatum {
	id: string;
}

interface LayoutLink extends SimulationLinkDatum<LayoutNode> {
	weight: number;
}

/** Centers on the mean and scales so the largest coordinate magnitude is 1. */
export const rescale = (
	raw: Map<string, Position>
): Map<string, Position> => {
	const points = Array.from(raw.values());
	if (points.length === 0) return new Map();

	const meanX = points.reduce((sum, p) => sum + p.x, 0) / points.length;
	const meanY = points.reduce((sum, p) => sum + p.y, 0) / points.length;
	const extent = points.reduce(
		(max, p) => Math.max(max, Math.abs(p.x - meanX), Math.abs(p.y - meanY)),
		0
	);

	const scaled = new Map<string, Position>();
	raw.forEach((p, id) => {
		scaled.set(
			id,
			extent === 0
				? { x: 0, y: 0 }
				: { x: (p.x - meanX) / extent, y: (p.y - meanY) / extent }
		);
	});
	return scaled;
};

export const computeLayout = (
	graph: ContactGraph,
	config: GraphConfig
): Map<string, Position> => {
	const { layout } = config;
	const nodes: LayoutNode[] = graph.nodes.map(node => ({ id: node.id }));
	const links: LayoutLink[] = graph.links
		.filter(link => link.weight > 0)
		.map(link => ({
			source: link.source,
			target: link.target,
			weight: link.weight,
		}));

	const simulation = forceSimulation<LayoutNode, LayoutLink>(nodes)
		.stop()
		.randomSource(randomLcg(layout.seed))
		.force(
			"link",
			forceLink<LayoutNode, LayoutLink>(links)
				.id(node => node.id)
				.distance(layout.linkDistance)
				.strength(link => link.weight)
		)
		.force(
			"charge",
			forceManyBody<LayoutNode>().strength(-layout.repelStrength)
		)
		.force("x", forceX<LayoutNode>(0).strength(layout.centerStrength))
		.force("y", forceY<LayoutNode>(0).strength(layout.centerStrength));

	simulation.tick(layout.iterations);

	const raw = new Map<string, Position>();
	nodes.forEach(node => {
		raw.set(node.id, { x: node.x ?? 0, y: node.y ?? 0 });
	});
	return rescale(raw);
};

const round = (value: number) => Math.round(value * 100) / 100;

/** Maps layout space ([-1, 1], y up) to SVG pixels (y down). */
export const toScreen = (
	position: Position,
	{ width, height, padding }: GraphConfig["plot"]
): Position => ({
	x: round(padding + ((position.x + 1) / 2) * (width - 2 * padding)),
	y: round(padding + ((1 - position.y) / 2) * (height - 2 * padding)),
});
