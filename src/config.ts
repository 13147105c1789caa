import { readFile } from 'fs/promises';
import { z } from 'zod';

export const scanConfigSchema = z.object({
  patterns: z.array(z.string().min(1)).min(1, 'at least one pattern is required'),
  output: z.string().min(1).optional(),
  showLiterals: z.boolean().default(false),
  verbose: z.boolean().default(false),
  key: z.string().min(1).optional(),
  sixNineStyle: z.enum(['69', '6/9']).default('69'),
  concurrency: z.number().int().positive().default(4),
});

/** Settings of a scan run after defaults are applied */
export type ScanConfig = z.infer<typeof scanConfigSchema>;

/** Settings as written in a config file or given as flags */
export type ScanConfigInput = z.input<typeof scanConfigSchema>;

// Unknown keys are typos, not extensions
export const configFileSchema = scanConfigSchema.partial().strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

/**
 * Invalid configuration, raised before any score is read
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
  }
}

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

/**
 * Read and validate a JSON config file. Every field is optional.
 */
export async function loadConfigFile(path: string): Promise<ConfigFile> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${path}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid config file ${path}`, describeIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Merge config-file settings with command-line flags. Flags win; flag
 * patterns are appended to the file's patterns.
 */
export function resolveConfig(file: ConfigFile, flags: Partial<ScanConfigInput>): ScanConfig {
  const merged: Record<string, unknown> = { ...file };
  for (const [name, value] of Object.entries(flags)) {
    if (value !== undefined) merged[name] = value;
  }
  merged.patterns = [...(file.patterns ?? []), ...(flags.patterns ?? [])];

  const parsed = scanConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError('Invalid options', describeIssues(parsed.error));
  }
  return parsed.data;
}
