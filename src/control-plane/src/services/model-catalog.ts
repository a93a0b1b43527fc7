/**
 * Model catalog
 *
 * Static description of the models offered through the compute provider:
 * selectable options, the price key of every option value, bundle price
 * rules and reference image handling. Loaded from data/model-catalog.json.
 */

import { z } from 'zod';
import catalogJson from '../../data/model-catalog.json';
import { ValidationError } from '../utils/errors.js';

const OptionValueSchema = z.object({
  value: z.string().min(1),
  label: z.string(),
  priceKey: z.string().min(1),
  /** Overrides the option-level flag for this value */
  priced: z.boolean().optional(),
});

const OptionSpecSchema = z
  .object({
    key: z.string().min(1),
    label: z.string(),
    default: z.string(),
    priced: z.boolean().default(true),
    /** Affects price only; never sent to the provider */
    uiOnly: z.boolean().default(false),
    values: z.array(OptionValueSchema).min(1),
  })
  .refine((option) => option.values.some((v) => v.value === option.default), {
    message: 'default must be one of the option values',
  });

const ReferencesSchema = z.object({
  mode: z.enum(['none', 'optional', 'required']),
  inputKey: z.string().default('image_input'),
  max: z.number().int().min(1).default(8),
  /** Option set automatically from whether reference images were given */
  toggleOption: z.string().optional(),
  withValue: z.string().default('has'),
  withoutValue: z.string().default('none'),
});

const BundleRuleSchema = z.object({
  when: z.record(z.string()),
  /** May contain `{option}` placeholders, replaced by the lowercased value */
  priceKey: z.string().min(1),
});

const ModelSpecSchema = z.object({
  key: z.string().min(1),
  provider: z.string(),
  providerModel: z.string().min(1),
  modelType: z.string(),
  displayName: z.string(),
  options: z.array(OptionSpecSchema),
  references: ReferencesSchema.default({ mode: 'none' }),
  bundles: z.array(BundleRuleSchema).default([]),
});

const CatalogFileSchema = z.object({
  models: z.array(ModelSpecSchema).min(1),
});

export type OptionValue = z.infer<typeof OptionValueSchema>;
export type OptionSpec = z.infer<typeof OptionSpecSchema>;
export type BundleRule = z.infer<typeof BundleRuleSchema>;
export type ModelSpec = z.infer<typeof ModelSpecSchema>;

export class ModelCatalog {
  private readonly models: Map<string, ModelSpec>;

  constructor(models: readonly ModelSpec[]) {
    this.models = new Map(models.map((model) => [model.key, model]));
  }

  static fromJson(raw: unknown): ModelCatalog {
    const result = CatalogFileSchema.safeParse(raw);
    if (!result.success) {
      const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
      throw new Error(`Invalid model catalog: ${errors}`);
    }
    return new ModelCatalog(result.data.models);
  }

  list(): ModelSpec[] {
    return [...this.models.values()];
  }

  get(modelKey: string): ModelSpec | null {
    return this.models.get(modelKey) ?? null;
  }
}

/**
 * Fill in defaults and replace values the model does not allow. The
 * reference toggle option, when the model has one, follows the number of
 * reference images actually supplied.
 */
export function normalizeOptions(
  model: ModelSpec,
  options: Readonly<Record<string, string>>,
  referenceCount: number
): Record<string, string> {
  const normalized: Record<string, string> = {};

  for (const option of model.options) {
    const requested = options[option.key];
    const allowed = requested !== undefined && option.values.some((v) => v.value === requested);
    normalized[option.key] = allowed ? requested : option.default;
  }

  const toggle = model.references.toggleOption;
  if (toggle !== undefined && toggle in normalized) {
    normalized[toggle] = referenceCount > 0 ? model.references.withValue : model.references.withoutValue;
  }

  return normalized;
}

export function findOptionValue(option: OptionSpec, value: string | undefined): OptionValue | undefined {
  return option.values.find((v) => v.value === (value ?? option.default));
}

/**
 * Provider request payload for one output unit
 */
export function buildInput(
  model: ModelSpec,
  prompt: string,
  options: Readonly<Record<string, string>>,
  referenceUrls: readonly string[]
): Record<string, unknown> {
  const payload: Record<string, unknown> = { prompt };

  for (const option of model.options) {
    if (option.uiOnly) {
      continue;
    }
    payload[option.key] = options[option.key] ?? option.default;
  }

  if (model.references.mode !== 'none' && referenceUrls.length > 0) {
    if (referenceUrls.length > model.references.max) {
      throw new ValidationError(
        `Model ${model.key} accepts at most ${model.references.max} reference images`,
        { given: referenceUrls.length }
      );
    }
    payload[model.references.inputKey] = [...referenceUrls];
  }

  return payload;
}

let catalogInstance: ModelCatalog | null = null;

export function getModelCatalog(): ModelCatalog {
  if (catalogInstance === null) {
    catalogInstance = ModelCatalog.fromJson(catalogJson);
  }
  return catalogInstance;
}

// For testing
export function resetModelCatalog(): void {
  catalogInstance = null;
}
