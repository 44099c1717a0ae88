import * as fs from 'fs';
import { z } from 'zod';
import { StatsConfigError, describeError } from './errors';
import { DEFAULT_PRESSURE_LABELS } from './pressure_index';
import { DEFAULT_ALPHA } from './win_weight';

const clamp = (min: number, max: number) => (value: number) => Math.min(max, Math.max(min, value));

const PressureBandSchema = z.object({
  label: z.string().min(1, 'Band label is required'),
  min: z.number().finite().optional(),
  max: z.number().finite().optional(),
});

const PressureLabelsSchema = z.object({
  bands: z.array(PressureBandSchema),
  neutral: z.string().min(1),
  insufficient: z.string().min(1),
});

export const StatsConfigSchema = z.object({
  // 0 disables bracket weighting
  alpha: z.number().finite().default(DEFAULT_ALPHA).transform(clamp(0, 5)),
  topTriples: z.number().int().default(50).transform(clamp(10, 500)),
  maxUniqueTriples: z.number().int().default(200).transform(clamp(10, 5000)),
  recentGames: z.number().int().default(30).transform(clamp(0, 500)),
  pressureLabels: PressureLabelsSchema.default(DEFAULT_PRESSURE_LABELS),
});

export type StatsConfig = z.output<typeof StatsConfigSchema>;
export type StatsConfigInput = z.input<typeof StatsConfigSchema>;

function formatIssues(error: z.ZodError): string {
  return error.errors.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

export function parseStatsConfig(input: unknown): StatsConfig {
  const result = StatsConfigSchema.safeParse(input);
  if (!result.success) {
    throw new StatsConfigError(`Invalid stats configuration: ${formatIssues(result.error)}`, { cause: result.error });
  }
  return result.data;
}

function readConfigFile(filePath: string): unknown {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new StatsConfigError(`Cannot read config file ${filePath}: ${describeError(error)}`, { cause: error });
  }
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new StatsConfigError(`Config file ${filePath} is not valid JSON: ${describeError(error)}`, { cause: error });
  }
}

/**
 * Reads the optional JSON config file and applies command-line overrides on top.
 * Overrides left undefined keep the file value or the default.
 */
export function loadStatsConfig(filePath?: string, overrides: Partial<StatsConfigInput> = {}): StatsConfig {
  const fromFile = filePath ? readConfigFile(filePath) : {};
  if (typeof fromFile !== 'object' || fromFile === null || Array.isArray(fromFile)) {
    throw new StatsConfigError(`Config file ${filePath} must contain a JSON object`);
  }
  const defined = Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined));
  return parseStatsConfig({ ...fromFile, ...defined });
}
