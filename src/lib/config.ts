import { readFile } from "node:fs/promises";
import { z } from "zod";

import { ConfigError } from "@/lib/errors";

export const SIDECAR_FIELDS = [
  "createDate",
  "focalLength",
  "fNumber",
  "camera",
  "lens",
  "flag",
  "keywords",
] as const;

export type SidecarField = (typeof SIDECAR_FIELDS)[number];

export type FieldMapping = Readonly<Record<SidecarField, string>>;

export type SchemaVariantName = "primary" | "alternative" | "alternative2";

export type SchemaVariant = Readonly<{
  name: SchemaVariantName;
  fields: FieldMapping;
}>;

export const FIELD_DIRECTIVES = ["trim", "trimStart", "trimEnd"] as const;

export type FieldDirective = (typeof FIELD_DIRECTIVES)[number];

export const FILTERABLE_COLUMNS = [
  "name",
  "camera",
  "lens",
  "flag",
  "focalLength",
  "fNumber",
  "cropFactor",
  "equivalentFocalLength",
  "date",
] as const;

export type FilterableColumn = (typeof FILTERABLE_COLUMNS)[number];

export type DropFilterValue = string | number;

export type Config = Readonly<{
  basePath: string;
  /** Tried in order; the first entry is the primary mapping. */
  schemaVariants: readonly SchemaVariant[];
  fieldProcessing: Readonly<Partial<Record<SidecarField, FieldDirective>>>;
  /** Stored without a leading dot. */
  sidecarExtensions: readonly string[];
  /** Stored lower-cased. */
  excludedDirectories: readonly string[];
  dropFilters: Readonly<
    Partial<Record<FilterableColumn, readonly DropFilterValue[]>>
  >;
  cropFactors: Readonly<Record<string, number>>;
  deleteDanglingSidecars: boolean;
  runDuplicateScan: boolean;
  currentVersion: string;
  maxVersionGroupsPerRun: number;
  parseConcurrency: number;
  timeoutMs?: number;
}>;

const SHARED_FIELDS = {
  focalLength: "@exif:FocalLength",
  fNumber: "@exif:FNumber",
  camera: "@tiff:Model",
  lens: "@alienexposure:lens",
  flag: "@alienexposure:pickflag",
  keywords: "alienexposure:virtualpaths",
} as const;

// other tools write the creation date under different keys
export const DEFAULT_SCHEMA_VARIANTS: readonly SchemaVariant[] = [
  {
    name: "primary",
    fields: { createDate: "@xmp:CreateDate", ...SHARED_FIELDS },
  },
  {
    name: "alternative",
    fields: { createDate: "@photoshop:DateCreated", ...SHARED_FIELDS },
  },
  {
    name: "alternative2",
    fields: { createDate: "@alienexposure:capture_time", ...SHARED_FIELDS },
  },
];

const fieldMappingSchema = z
  .object({
    createDate: z.string().min(1),
    focalLength: z.string().min(1),
    fNumber: z.string().min(1),
    camera: z.string().min(1),
    lens: z.string().min(1),
    flag: z.string().min(1),
    keywords: z.string().min(1),
  })
  .strict()
  .partial();

const directiveSchema = z.enum(FIELD_DIRECTIVES);

const dropValuesSchema = z.array(z.union([z.string(), z.number()]));

export const configInputSchema = z
  .object({
    basePath: z.string().min(1),
    schemaVariants: z
      .object({
        primary: fieldMappingSchema,
        alternative: fieldMappingSchema,
        alternative2: fieldMappingSchema,
      })
      .strict()
      .partial(),
    fieldProcessing: z
      .object({
        createDate: directiveSchema,
        focalLength: directiveSchema,
        fNumber: directiveSchema,
        camera: directiveSchema,
        lens: directiveSchema,
        flag: directiveSchema,
      })
      .strict()
      .partial(),
    sidecarExtensions: z.array(z.string().min(1)).min(1),
    excludedDirectories: z.array(z.string().min(1)),
    dropFilters: z
      .object({
        name: dropValuesSchema,
        camera: dropValuesSchema,
        lens: dropValuesSchema,
        flag: dropValuesSchema,
        focalLength: dropValuesSchema,
        fNumber: dropValuesSchema,
        cropFactor: dropValuesSchema,
        equivalentFocalLength: dropValuesSchema,
        date: dropValuesSchema,
      })
      .strict()
      .partial(),
    cropFactors: z.record(z.string(), z.number().positive()),
    deleteDanglingSidecars: z.boolean(),
    runDuplicateScan: z.boolean(),
    currentVersion: z.string().min(1),
    maxVersionGroupsPerRun: z.number().int().nonnegative(),
    parseConcurrency: z.number().int().positive(),
    timeoutMs: z.number().int().positive(),
  })
  .strict()
  .partial();

export type ConfigInput = z.input<typeof configInputSchema>;

const envFlagSchema = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const envIntegerSchema = z.coerce.number().int().positive();

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }

  return value;
}

/**
 * Merges `input` over the defaults, validates the result and returns a
 * frozen configuration.
 */
export function createConfig(input: ConfigInput): Config {
  const parsed = configInputSchema.safeParse(input);

  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }

  const options = parsed.data;

  if (!options.basePath) {
    throw new ConfigError("LIBRARY_PATH env var is required");
  }

  const schemaVariants = DEFAULT_SCHEMA_VARIANTS.map((variant) => ({
    name: variant.name,
    fields: { ...variant.fields, ...options.schemaVariants?.[variant.name] },
  }));

  const sidecarExtensions = (
    options.sidecarExtensions ?? ["exposurex6", "exposurex7"]
  ).map((extension) => extension.replace(/^\.+/, ""));

  const config: Config = {
    basePath: options.basePath,
    schemaVariants,
    fieldProcessing: options.fieldProcessing ?? { lens: "trimEnd" },
    sidecarExtensions,
    excludedDirectories: (
      options.excludedDirectories ?? ["recycling", "incoming"]
    ).map((name) => name.toLowerCase()),
    dropFilters: options.dropFilters ?? { flag: [2] },
    cropFactors: options.cropFactors ?? { "OLYMPUS E-M5 MARK III": 2 },
    deleteDanglingSidecars: options.deleteDanglingSidecars ?? true,
    runDuplicateScan: options.runDuplicateScan ?? true,
    currentVersion: options.currentVersion ?? "exposurex7",
    maxVersionGroupsPerRun: options.maxVersionGroupsPerRun ?? 10,
    parseConcurrency: options.parseConcurrency ?? 16,
    timeoutMs: options.timeoutMs,
  };

  return deepFreeze(config);
}

function readEnvFlag(
  env: NodeJS.ProcessEnv,
  key: string,
): boolean | undefined {
  const raw = env[key];
  if (raw === undefined || raw === "") {
    return undefined;
  }

  const parsed = envFlagSchema.safeParse(raw.toLowerCase());
  if (!parsed.success) {
    throw new ConfigError(`${key} must be one of true, false, 1, 0 (got: ${raw})`);
  }

  return parsed.data;
}

function readEnvInteger(
  env: NodeJS.ProcessEnv,
  key: string,
): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw === "") {
    return undefined;
  }

  const parsed = envIntegerSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`${key} must be a positive integer (got: ${raw})`);
  }

  return parsed.data;
}

// only variables that are set make it into the result, so they never
// blank out values from the config file
export function configFromEnv(env: NodeJS.ProcessEnv): ConfigInput {
  const overrides: ConfigInput = {};

  if (env.LIBRARY_PATH) {
    overrides.basePath = env.LIBRARY_PATH;
  }

  if (env.CURRENT_VERSION) {
    overrides.currentVersion = env.CURRENT_VERSION;
  }

  const deleteDangling = readEnvFlag(env, "DELETE_DANGLING_SIDECARS");
  if (deleteDangling !== undefined) {
    overrides.deleteDanglingSidecars = deleteDangling;
  }

  const runDuplicateScan = readEnvFlag(env, "RUN_DUPLICATE_SCAN");
  if (runDuplicateScan !== undefined) {
    overrides.runDuplicateScan = runDuplicateScan;
  }

  const parseConcurrency = readEnvInteger(env, "PARSE_CONCURRENCY");
  if (parseConcurrency !== undefined) {
    overrides.parseConcurrency = parseConcurrency;
  }

  const timeoutMs = readEnvInteger(env, "INGEST_TIMEOUT_MS");
  if (timeoutMs !== undefined) {
    overrides.timeoutMs = timeoutMs;
  }

  return overrides;
}

export async function readConfigFile(configPath: string): Promise<unknown> {
  const contents = await readFile(configPath, "utf8");

  try {
    return JSON.parse(contents);
  } catch (error) {
    throw new ConfigError(
      `Config file ${configPath} is not valid JSON: ${
        error instanceof Error ? error.message : String(error)
      }`,
    );
  }
}

export type LoadConfigOptions = {
  env?: NodeJS.ProcessEnv;
  configPath?: string;
};

/**
 * Builds the process configuration from an optional JSON file
 * (`configPath` or `SIDECAR_CONFIG`) with environment variables on top.
 * The caller is expected to have loaded any .env files already.
 */
export async function loadConfig(
  options: LoadConfigOptions = {},
): Promise<Config> {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? env.SIDECAR_CONFIG;

  let fileInput: ConfigInput = {};
  if (configPath) {
    const parsed = configInputSchema.safeParse(await readConfigFile(configPath));
    if (!parsed.success) {
      throw new ConfigError(
        `Invalid config file ${configPath}: ${formatIssues(parsed.error)}`,
      );
    }
    fileInput = parsed.data;
  }

  return createConfig({ ...fileInput, ...configFromEnv(env) });
}
