import { readFile } from "node:fs/promises";
import Papa from "papaparse";
import { z } from "zod";
import { ContactGraphError } from "./errors";
import type { EdgeRecord, NodeRecord } from "./types";

type CsvRow = Record<string, string | undefined>;

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ].*)?$/;
const INTEGER = /^-?\d+(?:\.0+)?$/;

const cell = z
	.string()
	.optional()
	.transform(value => (value ?? "").trim());

const isCalendarDate = (year: number, month: number, day: number) => {
	const date = new Date(Date.UTC(year, month - 1, day));
	return (
		date.getUTCFullYear() === year &&
		date.getUTCMonth() === month - 1 &&
		date.getUTCDate() === day
	);
};

/** Normalizes a date or datetime cell to YYYY-MM-DD, or null if malformed. */
export const toIsoDate = (value: string): string | null => {
	const match = ISO_DATE.exec(value.trim());
	if (
		!match ||
		!isCalendarDate(Number(match[1]), Number(match[2]), Number(match[3]))
	) {
		return null;
	}
	return value.trim().slice(0, 10);
};

const caseCell = cell.transform((value, ctx) => {
	if (value === "") return null;
	if (!INTEGER.test(value)) {
		ctx.addIssue({
			code: z.ZodIssueCode.custom,
			message: `case "${value}" is not an integer`,
		});
		return z.NEVER;
	}
	return Number.parseInt(value, 10);
});

const dateCell = cell.transform((value, ctx) => {
	if (value === "") return null;
	const date = toIsoDate(value);
	if (date === null) {
		ctx.addIssue({
			code: z.ZodIssueCode.custom,
			message: `date "${value}" is not a YYYY-MM-DD date`,
		});
		return z.NEVER;
	}
	return date;
});

const idCell = cell.pipe(z.string().min(1, "id is required"));

const nodeRowSchema = z.object({
	id: idCell,
	case: caseCell,
	date: dateCell,
});

const edgeRowSchema = z.object({
	source: cell.pipe(z.string().min(1, "source is required")),
	target: cell.pipe(z.string().min(1, "target is required")),
});

const NODE_COLUMNS = new Set(["id", "case", "date"]);
const EDGE_COLUMNS = new Set(["source", "target"]);

const parseCsv = (
	csv: string,
	table: string,
	transformHeader: (header: string, index: number) => string
): CsvRow[] => {
	const result = Papa.parse<CsvRow>(csv, {
		header: true,
		delimiter: ",",
		skipEmptyLines: "greedy",
		transformHeader,
	});

	// short rows leave their trailing cells undefined, which reads as empty
	const errors = result.errors.filter(error => error.code !== "TooFewFields");
	if (errors.length > 0) {
		const [first] = errors;
		const row = first.row !== undefined ? ` (row ${first.row + 1})` : "";
		throw new ContactGraphError(
			"INVALID_TABLE",
			`Failed to parse ${table} table${row}: ${first.message}`
		);
	}

	return result.data;
};

const rowError = (table: string, index: number, error: z.ZodError) =>
	new ContactGraphError(
		"INVALID_TABLE",
		`Invalid ${table} row ${index + 1}: ${error.issues
			.map(issue => `${issue.path.join(".")}: ${issue.message}`)
			.join("; ")}`
	);

const attributesOf = (row: CsvRow, exclude: Set<string>) => {
	const attributes: Record<string, string> = {};
	Object.entries(row).forEach(([key, value]) => {
		if (key === "" || exclude.has(key)) return;
		const trimmed = (value ?? "").trim();
		if (trimmed !== "") attributes[key] = trimmed;
	});
	return attributes;
};

/**
 * Parses the people table. A header-less first column (an unnamed index
 * column) is taken as the node id.
 */
export const parseNodeTable = (csv: string, groups: string[]): NodeRecord[] => {
	const rows = parseCsv(csv, "nodes", (header, index) => {
		const name = header.trim();
		return index === 0 && name === "" ? "id" : name;
	});

	const excluded = new Set([...NODE_COLUMNS, ...groups]);
	const seen = new Set<string>();

	return rows.map((row, index) => {
		const parsed = nodeRowSchema.safeParse(row);
		if (!parsed.success) throw rowError("nodes", index, parsed.error);

		const { id, case: caseNumber, date } = parsed.data;
		if (seen.has(id)) {
			throw new ContactGraphError(
				"INVALID_TABLE",
				`Invalid nodes row ${index + 1}: duplicate id "${id}"`
			);
		}
		seen.add(id);

		const memberships: Record<string, string> = {};
		groups.forEach(group => {
			const value = (row[group] ?? "").trim();
			if (value !== "") memberships[group] = value;
		});

		return {
			id,
			caseNumber,
			testDate: date,
			groups: memberships,
			attributes: attributesOf(row, excluded),
		};
	});
};

export const parseEdgeTable = (csv: string): EdgeRecord[] => {
	const rows = parseCsv(csv, "edges", header => header.trim());

	return rows.map((row, index) => {
		const parsed = edgeRowSchema.safeParse(row);
		if (!parsed.success) throw rowError("edges", index, parsed.error);

		return {
			source: parsed.data.source,
			target: parsed.data.target,
			attributes: attributesOf(row, EDGE_COLUMNS),
		};
	});
};

const readTable = async (path: string) => {
	try {
		return await readFile(path, "utf8");
	} catch (err) {
		throw new ContactGraphError(
			"IO",
			`Failed to read ${path}: ${err instanceof Error ? err.message : String(err)}`
		);
	}
};

export const readTables = async (
	nodesPath: string,
	edgesPath: string,
	groups: string[]
): Promise<{ nodes: NodeRecord[]; edges: EdgeRecord[] }> => {
	const [nodesCsv, edgesCsv] = await Promise.all([
		readTable(nodesPath),
		readTable(edgesPath),
	]);

	return {
		nodes: parseNodeTable(nodesCsv, groups),
		edges: parseEdgeTable(edgesCsv),
	};
};
