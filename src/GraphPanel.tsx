import type { GraphConfig } from "./config";
import { edgeKey } from "./contactGraph";
import { edgeDash, tabEdgeAlpha } from "./encoding";
import { toScreen } from "./layout";
import type {
	ContactGraph,
	ContactNode,
	NodeStyle,
	Position,
	TabSpec,
} from "./types";

interface GraphPanelProps {
	index: number;
	tab: TabSpec;
	graph: ContactGraph;
	positions: Map<string, Position>;
	styles: Map<string, NodeStyle>;
	config: GraphConfig;
	query: string;
	active: boolean;
}

const ORIGIN: Position = { x: 0, y: 0 };

export const nodeField = (node: ContactNode, column: string): string | null => {
	if (column === "case") {
		return node.caseNumber === null ? null : String(node.caseNumber);
	}
	if (column === "date") return node.testDate;
	return node.groups[column] ?? node.attributes[column] ?? null;
};

export const nodeTooltip = (node: ContactNode, config: GraphConfig) =>
	config.tooltipFields
		.map(({ label, column }) => {
			const value = nodeField(node, column);
			return value === null ? null : `${label}: ${value}`;
		})
		.filter((line): line is string => line !== null)
		.join("\n");

export const GraphPanel = ({
	index,
	tab,
	graph,
	positions,
	styles,
	config,
	query,
	active,
}: GraphPanelProps) => {
	const { width, height } = config.plot;
	const screen = (id: string) =>
		toScreen(positions.get(id) ?? ORIGIN, config.plot);

	const visibleLinks = graph.links
		.map(link => ({ link, alpha: tabEdgeAlpha(tab, link) }))
		.filter(({ alpha }) => alpha > 0);

	return (
		<section className="panel" data-tab={index} hidden={!active}>
			<h2 className="panel-title">{tab.title}</h2>
			<svg
				className="plot"
				xmlns="http://www.w3.org/2000/svg"
				width={width}
				height={height}
				viewBox={`0 0 ${width} ${height}`}
			>
				<g className="edges">
					{visibleLinks.map(({ link, alpha }) => {
						const source = screen(link.source);
						const target = screen(link.target);
						const dash = edgeDash(link, config);
						return (
							<line
								key={edgeKey(link.source, link.target)}
								data-type={link.type}
								x1={source.x}
								y1={source.y}
								x2={target.x}
								y2={target.y}
								stroke={config.colors.edge}
								strokeWidth={config.edges.lineWidth}
								strokeOpacity={alpha}
								strokeDasharray={
									dash.length > 0 ? dash.join(" ") : undefined
								}
							/>
						);
					})}
				</g>
				<g className="nodes">
					{graph.nodes.map(node => {
						const { x, y } = screen(node.id);
						const style = styles.get(node.id) ?? {
							alpha: node.alpha,
							size: config.node.size,
						};
						const tooltip = nodeTooltip(node, config);
						return (
							<circle
								key={node.id}
								className="node"
								data-id={node.id}
								data-case={node.caseNumber ?? undefined}
								data-alpha={node.alpha}
								cx={x}
								cy={y}
								r={style.size / 2}
								fill={node.color}
								fillOpacity={style.alpha}
								stroke={node.color}
								strokeOpacity={style.alpha}
							>
								{tooltip !== "" && <title>{tooltip}</title>}
							</circle>
						);
					})}
				</g>
				<g className="labels">
					{graph.nodes
						.filter(node => node.labeled && node.caseNumber !== null)
						.map(node => {
							const { x, y } = screen(node.id);
							return (
								<text
									key={node.id}
									x={x + 3}
									y={y - 3}
									fontSize="12px"
									fill={config.colors.label}
								>
									{node.caseNumber}
								</text>
							);
						})}
				</g>
			</svg>
			<div className="controls">
				<label>
					Search Case:{" "}
					<input
						className="search"
						type="text"
						placeholder="case_number"
						defaultValue={query}
					/>
				</label>
				<button className="reset" type="button">
					Reset
				</button>
			</div>
		</section>
	);
};
