import modelsConfig from './models.json' with { type: 'json' };
import type { CatalogModel, ModelRule, ModelsConfig } from './types.js';

export const MODELS_CONFIG: ModelsConfig = modelsConfig;
export const DEFAULT_MODEL = MODELS_CONFIG.defaultModel;

export interface NormalizationRule {
  matches: (model: string) => boolean;
  model: string;
}

/** Case-insensitive substring rule, the form used by models.json. */
export function containsRule(rule: ModelRule): NormalizationRule {
  const needle = rule.contains.toLowerCase();
  return {
    matches: (model) => model.toLowerCase().includes(needle),
    model: rule.model,
  };
}

/**
 * Rewrites client model names to the identifiers the upstream accepts.
 * Rules are evaluated in order, so the table must list the most specific
 * patterns first. Names that match nothing pass through unchanged.
 */
export class ModelNormalizer {
  private readonly rules: readonly NormalizationRule[];

  constructor(rules: readonly NormalizationRule[]) {
    this.rules = rules;
  }

  static fromConfig(config: Pick<ModelsConfig, 'rules'> = MODELS_CONFIG): ModelNormalizer {
    return new ModelNormalizer(config.rules.map(containsRule));
  }

  normalize(model: string): string {
    const trimmed = model.trim();
    for (const rule of this.rules) {
      if (rule.matches(trimmed)) return rule.model;
    }
    return trimmed;
  }
}

export interface ModelListEntry {
  id: string;
  object: 'model';
  created: number;
  owned_by: string;
  display_name: string;
  context_window: number;
  max_output_tokens: number;
}

const CATALOG_CREATED = 1700000000;

function toListEntry(model: CatalogModel): ModelListEntry {
  return {
    id: model.id,
    object: 'model',
    created: CATALOG_CREATED,
    owned_by: 'google',
    display_name: model.name,
    context_window: model.context,
    max_output_tokens: model.output,
  };
}

export function getModels(config: ModelsConfig = MODELS_CONFIG): ModelListEntry[] {
  return config.models.map(toListEntry);
}

export function findModel(id: string, config: ModelsConfig = MODELS_CONFIG): ModelListEntry | undefined {
  const model = config.models.find((m) => m.id === id);
  return model ? toListEntry(model) : undefined;
}
