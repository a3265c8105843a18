// Scam Honeypot - Data Catalog
// Loads and validates the authored data files under data/: signal layers,
// reply templates, quality probes, the intent lexicon and the entity lexicon.

import { readFileSync } from "node:fs";
import { z } from "zod";
import {
  INTENT_NAMES,
  INTEL_KINDS,
  SIGNAL_CATEGORIES,
  TACTIC_TAGS,
  TEMPLATE_THEMES,
  type IntelKind,
  type IntentName,
  type LayerKind,
  type SignalCategory,
  type StageKey,
  type TacticTag,
} from "./types.js";

// ─── Errors ─────────────────────────────────────────────────────────────────────

export class CatalogError extends Error {
  readonly file: string;

  constructor(file: string, message: string) {
    super(`Invalid data file ${file}: ${message}`);
    this.name = "CatalogError";
    this.file = file;
  }
}

// ─── Schemas ────────────────────────────────────────────────────────────────────

const RuleSchema = z.object({
  pattern: z.string().min(1),
  weight: z.number().int().positive(),
});

const SignalLayersSchema = z.object({
  layers: z
    .array(
      z.object({
        id: z.enum(SIGNAL_CATEGORIES),
        kind: z.enum(["core", "auxiliary"]),
        rules: z.array(RuleSchema).min(1),
      }),
    )
    .length(SIGNAL_CATEGORIES.length),
  greetings: z.array(z.string().min(1)),
});

const TemplateSchema = z.object({
  id: z.string().min(1),
  text: z.string().min(1),
  theme: z.enum(TEMPLATE_THEMES),
});

const TemplateListSchema = z.array(TemplateSchema).min(1);

const ResponseTemplatesSchema = z.object({
  stages: z.object({
    confused: TemplateListSchema,
    verifying: TemplateListSchema,
    suspicious: TemplateListSchema,
    cooperative: TemplateListSchema,
    extracting: TemplateListSchema,
  }),
  tactics: z.record(z.enum(TACTIC_TAGS), TemplateListSchema),
});

const QualityProbesSchema = z.object({
  investigative: z.array(z.string().includes("?")).min(1),
  elicitation: z
    .array(z.object({ text: z.string().includes("?"), asks: z.enum(INTEL_KINDS) }))
    .min(1),
  redFlags: z.record(z.string(), z.array(z.string().min(1)).min(1)),
  connectors: z.array(z.string()).min(1),
});

const IntentLexiconSchema = z.object({
  intents: z.array(z.object({ name: z.enum(INTENT_NAMES), keywords: z.array(z.string().min(1)) })),
  handFeatures: z.object({
    probeWords: z.array(z.string()),
    personaWords: z.array(z.string()),
    stallTokens: z.array(z.string()),
    complianceWords: z.array(z.string()),
    hinglishWords: z.array(z.string()),
  }),
});

const EntityLexiconSchema = z.object({
  upiProviders: z.array(z.string().regex(/^[a-z][a-z0-9]*$/)).min(1),
  shorteners: z.array(z.string().min(1)),
  suspiciousTlds: z.array(z.string().regex(/^[a-z]+$/)),
});

// ─── Catalog Types ──────────────────────────────────────────────────────────────

export interface CompiledRule {
  regex: RegExp;
  source: string;
  weight: number;
}

export interface SignalLayer {
  id: SignalCategory;
  category: SignalCategory;
  kind: LayerKind;
  rules: CompiledRule[];
}

export type ReplyTemplate = z.infer<typeof TemplateSchema>;

export interface ElicitationTemplate {
  text: string;
  asks: IntelKind;
}

export interface ProbeCatalog {
  investigative: string[];
  elicitation: ElicitationTemplate[];
  redFlags: Record<string, string[]>;
  connectors: string[];
}

export interface IntentLexicon {
  /** Lower-cased keywords per intent, indexed like INTENT_NAMES */
  keywords: string[][];
  handFeatures: z.infer<typeof IntentLexiconSchema>["handFeatures"];
}

export interface EntityLexicon {
  upiProviders: ReadonlySet<string>;
  shorteners: string[];
  suspiciousTlds: string[];
}

export interface Catalog {
  layers: SignalLayer[];
  greetings: RegExp[];
  stageTemplates: Record<StageKey, ReplyTemplate[]>;
  tacticTemplates: Partial<Record<TacticTag, ReplyTemplate[]>>;
  probes: ProbeCatalog;
  intents: IntentLexicon;
  entities: EntityLexicon;
}

// ─── Loading ────────────────────────────────────────────────────────────────────

const DATA_DIR = new URL("../data/", import.meta.url);

function readJson(file: string): unknown {
  let raw: string;
  try {
    raw = readFileSync(new URL(file, DATA_DIR), "utf-8");
  } catch (err) {
    throw new CatalogError(file, err instanceof Error ? err.message : String(err));
  }
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new CatalogError(file, `not valid JSON (${err instanceof Error ? err.message : String(err)})`);
  }
}

function parseWith<S extends z.ZodTypeAny>(file: string, schema: S, value: unknown): z.output<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new CatalogError(file, `${first.path.join(".") || "(root)"}: ${first.message}`);
  }
  return parsed.data;
}

function compilePattern(file: string, pattern: string, flags: string): RegExp {
  try {
    return new RegExp(pattern, flags);
  } catch (err) {
    throw new CatalogError(file, `bad pattern ${pattern}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

export function buildSignalLayers(value: unknown, file = "signal-layers.json"): Pick<Catalog, "layers" | "greetings"> {
  const data = parseWith(file, SignalLayersSchema, value);
  const seen = new Set<SignalCategory>();
  const layers = data.layers.map((layer) => {
    if (seen.has(layer.id)) throw new CatalogError(file, `duplicate layer ${layer.id}`);
    seen.add(layer.id);
    return {
      id: layer.id,
      category: layer.id,
      kind: layer.kind,
      rules: layer.rules.map((r) => ({
        regex: compilePattern(file, r.pattern, "i"),
        source: r.pattern,
        weight: r.weight,
      })),
    };
  });
  return { layers, greetings: data.greetings.map((g) => compilePattern(file, g, "i")) };
}

export function buildTemplates(
  value: unknown,
  file = "response-templates.json",
): Pick<Catalog, "stageTemplates" | "tacticTemplates"> {
  const data = parseWith(file, ResponseTemplatesSchema, value);
  const ids = new Set<string>();
  const lists: ReplyTemplate[][] = Object.values(data.stages);
  for (const tag of TACTIC_TAGS) {
    const list = data.tactics[tag];
    if (list) lists.push(list);
  }
  for (const t of lists.flat()) {
    if (ids.has(t.id)) throw new CatalogError(file, `duplicate template id ${t.id}`);
    ids.add(t.id);
  }
  return { stageTemplates: data.stages, tacticTemplates: data.tactics };
}

export function buildProbes(value: unknown, file = "quality-probes.json"): ProbeCatalog {
  const data = parseWith(file, QualityProbesSchema, value);
  if (!data.redFlags.generic) throw new CatalogError(file, "redFlags.generic is required");
  return data;
}

export function buildIntentLexicon(value: unknown, file = "intent-lexicon.json"): IntentLexicon {
  const data = parseWith(file, IntentLexiconSchema, value);
  const byName = new Map(data.intents.map((i): [IntentName, string[]] => [i.name, i.keywords]));
  const keywords = INTENT_NAMES.map((name) => {
    const list = byName.get(name);
    if (!list) throw new CatalogError(file, `missing intent ${name}`);
    return list.map((k) => k.toLowerCase());
  });
  return { keywords, handFeatures: data.handFeatures };
}

export function buildEntityLexicon(value: unknown, file = "entity-lexicon.json"): EntityLexicon {
  const data = parseWith(file, EntityLexiconSchema, value);
  return {
    upiProviders: new Set(data.upiProviders),
    shorteners: data.shorteners.map((d) => d.toLowerCase()),
    suspiciousTlds: data.suspiciousTlds,
  };
}

let cached: Catalog | null = null;

/** Reads every data file once per process. Throws CatalogError on the first invalid file. */
export function loadCatalog(): Catalog {
  if (cached) return cached;
  cached = {
    ...buildSignalLayers(readJson("signal-layers.json")),
    ...buildTemplates(readJson("response-templates.json")),
    probes: buildProbes(readJson("quality-probes.json")),
    intents: buildIntentLexicon(readJson("intent-lexicon.json")),
    entities: buildEntityLexicon(readJson("entity-lexicon.json")),
  };
  return cached;
}
