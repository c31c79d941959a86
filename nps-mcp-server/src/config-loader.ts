import { readFileSync, existsSync } from "fs";
import { resolve } from "path";
import yaml from "js-yaml";
import { z } from "zod";
import { logger } from "../../shared/observability/src/logger.js";

const DEFAULT_RULES_PATH = resolve(process.cwd(), "config/nps_rules.yml");

const keywordList = z.array(z.string().min(1)).min(1);

const DefaultsSchema = z.object({
  nps_target: z.number(),
  min_responses: z.number().int().positive(),
  base_year: z.number().int().min(2000).max(2100),
  cache_ttl_seconds: z.number().int().positive(),
  status_band_width: z.number().positive(),
  large_change_threshold: z.number().positive(),
  high_senior_share: z.number().min(0).max(100),
  senior_gap_threshold: z.number().positive(),
});

const ColumnMapSchema = z.object({
  processed_date: z.string(),
  score: z.string(),
  agent_id: z.string(),
  agent_name: z.string(),
  dealer_name: z.string(),
  store_name: z.string(),
  team: z.string(),
  is_senior: z.string(),
  excluded: z.string(),
});

export const NpsRulesSchema = z.object({
  defaults: DefaultsSchema,
  teams: z.array(z.object({ keyword: z.string().min(1), team: z.string().min(1) })),
  nps: z.object({
    below_terms: keywordList,
    above_terms: keywordList,
    low_keywords: keywordList,
    high_keywords: keywordList,
  }),
  senior: z.object({
    token: z.string().min(1),
    custom_terms: keywordList,
    high_keywords: keywordList,
    low_keywords: keywordList,
    gap_intent_keywords: keywordList,
  }),
  trend: z.object({
    decrease: keywordList,
    increase: keywordList,
  }),
  comparison_keywords: keywordList,
  dataset: z.object({
    table: z.string().regex(/^[A-Za-z_][A-Za-z0-9_.]*$/, "table must be a plain identifier"),
    columns: ColumnMapSchema,
  }),
});

export type NpsRules = z.infer<typeof NpsRulesSchema>;
export type AnalysisDefaults = NpsRules["defaults"];
export type DatasetColumnMap = NpsRules["dataset"]["columns"];

export class RulesConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RulesConfigError";
  }
}

export function loadNpsRules(configPath: string = process.env.NPS_RULES_PATH || DEFAULT_RULES_PATH): NpsRules {
  if (!existsSync(configPath)) {
    throw new RulesConfigError(`NPS rules file not found at: ${configPath}`);
  }

  let raw: unknown;
  try {
    raw = yaml.load(readFileSync(configPath, "utf8"));
  } catch (error) {
    throw new RulesConfigError(
      `Failed to parse NPS rules: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const parsed = NpsRulesSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new RulesConfigError(`Invalid NPS rules in ${configPath}: ${issues}`);
  }

  logger.debug(`Loaded NPS rules from ${configPath}`, { teams: parsed.data.teams.length });
  return parsed.data;
}

let _rules: NpsRules | null = null;

/** Rules loaded once per process. */
export function getNpsRules(): NpsRules {
  if (!_rules) _rules = loadNpsRules();
  return _rules;
}
