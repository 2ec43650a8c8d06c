import type { GraphConfig } from "./config";
import { GraphPanel } from "./GraphPanel";
import type {
	ContactGraph,
	NodeStyle,
	Position,
	TabSpec,
} from "./types";

interface ReportProps {
	title: string;
	graph: ContactGraph;
	positions: Map<string, Position>;
	tabs: TabSpec[];
	styles: Map<string, NodeStyle>;
	config: GraphConfig;
	query: string;
	viewerScript: string;
}

const STYLE = `
body { margin: 0; font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, Arial, sans-serif; color: #2e3440; }
#report { padding: 16px; }
.tabs { display: flex; gap: 4px; border-bottom: 1px solid #d8dee9; }
.tab { border: 1px solid #d8dee9; border-bottom: none; background: #eceff4; padding: 6px 12px; cursor: pointer; font-size: 14px; }
.tab[aria-selected="true"] { background: #ffffff; font-weight: 600; }
.panel-title { font-size: 14px; font-weight: 600; margin: 12px 0 4px; }
.plot { display: block; cursor: grab; user-select: none; }
.plot:active { cursor: grabbing; }
.controls { display: flex; align-items: center; gap: 8px; margin: 8px 0; }
.controls input { padding: 4px 8px; }
.instructions { max-width: 1500px; font-size: 14px; line-height: 1.5; }
`;

const Instructions = ({ config }: { config: GraphConfig }) => {
	const { windowDays, oldestAlpha } = config.recency;
	return (
		<div className="instructions">
			<b>Instructions:</b>
			<br />
			Red nodes are positive cases within the last {windowDays} days; they
			are labeled with their case number. The opacity of a red node
			decreases as the time since the positive test increases, ranging from
			1 (today) to {oldestAlpha} ({windowDays} days ago). All other nodes are
			blue. Solid edges indicate a contact trace. Dashed edges indicate the
			two nodes are members of the same group. Use the tabs to toggle edges
			by type. Hover over a node for more information. Search for a case
			number by typing into the search box and pressing enter. If the case
			is found, it will be enlarged. To reset the search, press the reset
			button. Scroll over the graph to zoom, drag to pan and double-click to
			restore the view.
		</div>
	);
};

export const Report = ({
	title,
	graph,
	positions,
	tabs,
	styles,
	config,
	query,
	viewerScript,
}: ReportProps) => (
	<html lang="en">
		<head>
			<meta charSet="UTF-8" />
			<meta name="viewport" content="width=device-width, initial-scale=1.0" />
			<title>{title}</title>
			<style dangerouslySetInnerHTML={{ __html: STYLE }} />
		</head>
		<body>
			<main
				id="report"
				data-size={config.node.size}
				data-selected-size={config.node.selectedSize}
				data-selected-alpha={config.node.selectedAlpha}
				data-unselected-alpha={config.node.unselectedAlpha}
			>
				<nav className="tabs" role="tablist">
					{tabs.map((tab, index) => (
						<button
							key={index}
							className="tab"
							type="button"
							role="tab"
							data-tab={index}
							aria-selected={index === 0}
						>
							{tab.name}
						</button>
					))}
				</nav>
				{tabs.map((tab, index) => (
					<GraphPanel
						key={index}
						index={index}
						tab={tab}
						graph={graph}
						positions={positions}
						styles={styles}
						config={config}
						query={query}
						active={index === 0}
					/>
				))}
				<Instructions config={config} />
			</main>
			<script dangerouslySetInnerHTML={{ __html: viewerScript }} />
		</body>
	</html>
);
