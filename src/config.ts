import { readFile } from "node:fs/promises";
import { z } from "zod";
import { ContactGraphError } from "./errors";

const hexColor = z.string().regex(/^#[0-9a-fA-F]{6}$/, "expected #RRGGBB");
const alpha = z.number().min(0).max(1);

const colorsSchema = z.object({
	positive: hexColor,
	other: hexColor,
	label: hexColor,
	edge: hexColor,
});

const nodeSchema = z.object({
	size: z.number().positive(),
	selectedSize: z.number().positive(),
	selectedAlpha: alpha,
	unselectedAlpha: alpha,
});

const recencySchema = z.object({
	windowDays: z.number().int().positive(),
	oldestAlpha: alpha,
});

const edgeSchema = z.object({
	lineWidth: z.number().positive(),
	membershipDash: z.array(z.number().nonnegative()),
	contactWeight: z.number().nonnegative(),
	membershipWeight: z.number().nonnegative(),
});

const layoutSchema = z.object({
	seed: z.number().int(),
	iterations: z.number().int().positive(),
	linkDistance: z.number().positive(),
	repelStrength: z.number().nonnegative(),
	centerStrength: z.number().nonnegative(),
});

const tabAlphaSchema = z.object({
	contact: alpha,
	membership: alpha,
});

const tabsSchema = z.object({
	all: tabAlphaSchema,
	contactTraces: tabAlphaSchema,
	groups: tabAlphaSchema,
	perGroup: tabAlphaSchema,
});

const plotSchema = z.object({
	width: z.number().int().positive(),
	height: z.number().int().positive(),
	padding: z.number().int().nonnegative(),
});

const tooltipFieldSchema = z.object({
	label: z.string().min(1),
	column: z.string().min(1),
});

export const configSchema = z.object({
	colors: colorsSchema,
	node: nodeSchema,
	recency: recencySchema,
	edges: edgeSchema,
	layout: layoutSchema,
	tabs: tabsSchema,
	plot: plotSchema,
	groups: z.array(z.string().min(1)),
	groupDisplayNames: z.record(z.string()),
	tooltipFields: z.array(tooltipFieldSchema),
});

export type GraphConfig = z.infer<typeof configSchema>;
export type TooltipField = z.infer<typeof tooltipFieldSchema>;

export const configOverrideSchema = z
	.object({
		colors: colorsSchema.partial(),
		node: nodeSchema.partial(),
		recency: recencySchema.partial(),
		edges: edgeSchema.partial(),
		layout: layoutSchema.partial(),
		tabs: z
			.object({
				all: tabAlphaSchema.partial(),
				contactTraces: tabAlphaSchema.partial(),
				groups: tabAlphaSchema.partial(),
				perGroup: tabAlphaSchema.partial(),
			})
			.partial(),
		plot: plotSchema.partial(),
		groups: z.array(z.string().min(1)),
		groupDisplayNames: z.record(z.string()),
		tooltipFields: z.array(tooltipFieldSchema),
	})
	.partial()
	.strict();

export type GraphConfigOverride = z.infer<typeof configOverrideSchema>;

export const TOOLTIP_FIELDS: TooltipField[] = [
	{ label: "Case_Number", column: "case" },
	{ label: "Test_Date", column: "test_date" },
	{ label: "Academic_Career", column: "academic_career" },
	{ label: "Chapter", column: "chapter" },
	{ label: "Sport", column: "sport_1" },
	{ label: "Building", column: "building" },
	{ label: "Job_Profile_Names", column: "job_profile_names" },
	{ label: "Department_Codes", column: "department_codes" },
	{ label: "Unit_Codes", column: "unit_codes" },
	{ label: "Primary_Work_Address", column: "primary_work_address_1" },
	{ label: "Notes", column: "notes" },
];

export const CONFIG: GraphConfig = {
	colors: {
		positive: "#DC0000",
		other: "#65ADFF",
		label: "#2E3440",
		edge: "#000000",
	},
	node: {
		size: 9,
		selectedSize: 16,
		selectedAlpha: 1,
		unselectedAlpha: 0.4,
	},
	recency: {
		windowDays: 14,
		oldestAlpha: 0.5,
	},
	edges: {
		lineWidth: 3,
		membershipDash: [5, 5],
		contactWeight: 1,
		membershipWeight: 0.05,
	},
	layout: {
		seed: 1,
		iterations: 150,
		linkDistance: 30,
		repelStrength: 40,
		centerStrength: 0.05,
	},
	tabs: {
		all: { contact: 1, membership: 0.1 },
		contactTraces: { contact: 1, membership: 0 },
		groups: { contact: 0, membership: 0.2 },
		perGroup: { contact: 0, membership: 0.2 },
	},
	plot: {
		width: 1500,
		height: 700,
		padding: 40,
	},
	groups: ["group_1", "group_2", "group_3"],
	groupDisplayNames: {},
	tooltipFields: TOOLTIP_FIELDS,
};

export const mergeConfig = (
	base: GraphConfig,
	override: GraphConfigOverride
): GraphConfig => ({
	colors: { ...base.colors, ...override.colors },
	node: { ...base.node, ...override.node },
	recency: { ...base.recency, ...override.recency },
	edges: { ...base.edges, ...override.edges },
	layout: { ...base.layout, ...override.layout },
	tabs: {
		all: { ...base.tabs.all, ...override.tabs?.all },
		contactTraces: { ...base.tabs.contactTraces, ...override.tabs?.contactTraces },
		groups: { ...base.tabs.groups, ...override.tabs?.groups },
		perGroup: { ...base.tabs.perGroup, ...override.tabs?.perGroup },
	},
	plot: { ...base.plot, ...override.plot },
	groups: override.groups ?? base.groups,
	groupDisplayNames: {
		...base.groupDisplayNames,
		...override.groupDisplayNames,
	},
	tooltipFields: override.tooltipFields ?? base.tooltipFields,
});

export const parseConfigOverride = (
	json: unknown,
	source: string
): GraphConfigOverride => {
	const result = configOverrideSchema.safeParse(json);
	if (!result.success) {
		const issues = result.error.issues
			.map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
			.join("; ");
		throw new ContactGraphError(
			"INVALID_CONFIG",
			`Invalid configuration in ${source}: ${issues}`
		);
	}
	return result.data;
};

/** Reads a JSON override file and merges it over `base`. */
export const loadConfig = async (
	path: string,
	base: GraphConfig = CONFIG
): Promise<GraphConfig> => {
	let text: string;
	try {
		text = await readFile(path, "utf8");
	} catch (err) {
		throw new ContactGraphError(
			"IO",
			`Failed to read config ${path}: ${err instanceof Error ? err.message : String(err)}`
		);
	}

	let json: unknown;
	try {
		json = JSON.parse(text);
	} catch (err) {
		throw new ContactGraphError(
			"INVALID_CONFIG",
			`Failed to parse config ${path}: ${err instanceof Error ? err.message : String(err)}`
		);
	}

	return mergeConfig(base, parseConfigOverride(json, path));
};
