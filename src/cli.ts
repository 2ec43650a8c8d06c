import { writeFile } from "node:fs/promises";
import { pathToFileURL } from "node:url";
import { parseArgs } from "node:util";
import { CONFIG, loadConfig } from "./config";
import {
	buildContactGraph,
	restrictToGroup,
	type RestrictOptions,
} from "./contactGraph";
import { ContactGraphError, isContactGraphError } from "./errors";
import { computeLayout } from "./layout";
import { renderReport } from "./render";
import { parseCaseQuery } from "./search";
import { readTables, toIsoDate } from "./tables";
import type { ContactGraph } from "./types";

export interface CliOptions {
	nodes: string;
	edges: string;
	date: string;
	out: string;
	groups?: string[];
	limit?: RestrictOptions;
	highlight?: number;
	configPath?: string;
	quiet: boolean;
}

export const USAGE = `Usage: contact-trace-graph --nodes <csv> --edges <csv> [options]

Options:
  --date <YYYY-MM-DD>       report date (default: today)
  --out <path>              output file (default: <date>.html)
  --group <column>          group column, repeatable (default: group_1..group_3)
  --limit <column=value>    keep only one group and its contacts
  --limit-mode <mode>       within | adjacent (default: adjacent)
  --highlight <case>        case number selected when the page opens
  --config <path>           JSON configuration overrides
  --quiet                   no progress output
  -h, --help                show this message`;

const invalid = (message: string) =>
	new ContactGraphError("INVALID_ARGUMENT", message);

const parseLimit = (
	limit: string | undefined,
	mode: string | undefined
): RestrictOptions | undefined => {
	if (limit === undefined) {
		if (mode !== undefined) throw invalid("--limit-mode requires --limit");
		return undefined;
	}

	const separator = limit.indexOf("=");
	if (separator <= 0) throw invalid(`--limit must be column=value, got "${limit}"`);

	const resolvedMode = mode ?? "adjacent";
	if (resolvedMode !== "within" && resolvedMode !== "adjacent") {
		throw invalid(`--limit-mode must be within or adjacent, got "${resolvedMode}"`);
	}

	return {
		column: limit.slice(0, separator).trim(),
		value: limit.slice(separator + 1).trim(),
		mode: resolvedMode,
	};
};

const readArgs = (argv: string[]) => {
	try {
		return parseArgs({
			args: argv,
			options: {
				nodes: { type: "string" },
				edges: { type: "string" },
				date: { type: "string" },
				out: { type: "string" },
				group: { type: "string", multiple: true },
				limit: { type: "string" },
				"limit-mode": { type: "string" },
				highlight: { type: "string" },
				config: { type: "string" },
				quiet: { type: "boolean", default: false },
				help: { type: "boolean", short: "h", default: false },
			},
			strict: true,
			allowPositionals: false,
		}).values;
	} catch (err) {
		throw invalid(err instanceof Error ? err.message : String(err));
	}
};

/** Returns null when help was requested. */
export const parseCliArgs = (
	argv: string[],
	today: string = new Date().toISOString().slice(0, 10)
): CliOptions | null => {
	const values = readArgs(argv);

	if (values.help) return null;
	if (values.nodes === undefined) throw invalid("--nodes is required");
	if (values.edges === undefined) throw invalid("--edges is required");

	const date = toIsoDate(values.date ?? today);
	if (date === null) throw invalid(`--date must be YYYY-MM-DD, got "${values.date}"`);

	let highlight: number | undefined;
	if (values.highlight !== undefined) {
		const parsed = parseCaseQuery(values.highlight);
		if (parsed === null) {
			throw invalid(`--highlight must be a case number, got "${values.highlight}"`);
		}
		highlight = parsed;
	}

	return {
		nodes: values.nodes,
		edges: values.edges,
		date,
		out: values.out ?? `${date}.html`,
		groups: values.group,
		limit: parseLimit(values.limit, values["limit-mode"]),
		highlight,
		configPath: values.config,
		quiet: values.quiet,
	};
};

export const run = async (
	options: CliOptions
): Promise<{ out: string; graph: ContactGraph }> => {
	const log = (...args: unknown[]) => {
		if (!options.quiet) console.log("[Render]", ...args);
	};

	const config = options.configPath
		? await loadConfig(options.configPath)
		: CONFIG;
	const groups = options.groups ?? config.groups;

	const tables = await readTables(options.nodes, options.edges, groups);
	log(`Loaded ${tables.nodes.length} people and ${tables.edges.length} contacts`);

	const { nodes, edges } = options.limit
		? restrictToGroup(tables.nodes, tables.edges, options.limit)
		: tables;
	if (options.limit) {
		log(
			`Limited to ${options.limit.column}=${options.limit.value} (${options.limit.mode}): ${nodes.length} people`
		);
	}

	const graph = buildContactGraph(nodes, edges, {
		reportDate: options.date,
		config,
		groups,
	});
	const { contactEdges, membershipEdges, droppedSelfLoops } = graph.summary;
	log(`Built graph: ${contactEdges} contact edges, ${membershipEdges} membership edges`);
	if (droppedSelfLoops > 0) {
		console.warn("[Render]", `Dropped ${droppedSelfLoops} self-loop contact(s)`);
	}
	if (
		options.highlight !== undefined &&
		!graph.nodes.some(node => node.caseNumber === options.highlight)
	) {
		console.warn("[Render]", `Case ${options.highlight} not found; rendering without a selection`);
	}

	const positions = computeLayout(graph, config);
	const html = await renderReport(graph, positions, {
		date: options.date,
		highlight: options.highlight,
		config,
	});

	try {
		await writeFile(options.out, html, "utf8");
	} catch (err) {
		throw new ContactGraphError(
			"IO",
			`Failed to write ${options.out}: ${err instanceof Error ? err.message : String(err)}`
		);
	}
	log(`Wrote ${options.out}`);

	return { out: options.out, graph };
};

export const main = async (argv: string[]): Promise<number> => {
	try {
		const options = parseCliArgs(argv);
		if (options === null) {
			console.log(USAGE);
			return 0;
		}
		await run(options);
		return 0;
	} catch (err) {
		if (isContactGraphError(err)) {
			console.error(`[Render] ${err.message}`);
			if (err.code === "INVALID_ARGUMENT") console.error(USAGE);
			return 1;
		}
		throw err;
	}
};

if (
	process.argv[1] !== undefined &&
	import.meta.url === pathToFileURL(process.argv[1]).href
) {
	main(process.argv.slice(2))
		.then(code => {
			process.exitCode = code;
		})
		.catch((err: unknown) => {
			console.error("[Render] Unexpected failure:", err);
			process.exitCode = 1;
		});
}
