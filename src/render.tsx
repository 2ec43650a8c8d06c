import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { renderToStaticMarkup } from "react-dom/server";
import { CONFIG, type GraphConfig } from "./config";
import { buildTabs, reportTitle } from "./encoding";
import { ContactGraphError } from "./errors";
import { Report } from "./Report";
import { resetStyles, searchCase } from "./search";
import type { ContactGraph, Position } from "./types";

export interface RenderOptions {
	/** Report date, used in the title when `title` is not given. */
	date: string;
	title?: string;
	/** Case number selected when the page opens. */
	highlight?: number;
	config?: GraphConfig;
}

const VIEWER_SCRIPT = fileURLToPath(
	new URL("../resources/viewer.js", import.meta.url)
);

let viewerScript: Promise<string> | null = null;

export const loadViewerScript = (): Promise<string> => {
	if (!viewerScript) {
		viewerScript = readFile(VIEWER_SCRIPT, "utf8").catch((err: unknown) => {
			viewerScript = null;
			throw new ContactGraphError(
				"IO",
				`Failed to read viewer script: ${err instanceof Error ? err.message : String(err)}`
			);
		});
	}
	return viewerScript;
};

export const renderReport = async (
	graph: ContactGraph,
	positions: Map<string, Position>,
	{ date, title = reportTitle(date), highlight, config = CONFIG }: RenderOptions
): Promise<string> => {
	const query = highlight === undefined ? "" : String(highlight);
	const styles =
		highlight === undefined
			? resetStyles(graph.nodes, config)
			: searchCase(graph.nodes, query, config).styles;

	const markup = renderToStaticMarkup(
		<Report
			title={title}
			graph={graph}
			positions={positions}
			tabs={buildTabs(title, graph.groups, config)}
			styles={styles}
			config={config}
			query={query}
			viewerScript={await loadViewerScript()}
		/>
	);

	return `<!DOCTYPE html>${markup}`;
};
