import { Ajv, type Options } from 'ajv';
import { Ajv2019 } from 'ajv/dist/2019.js';
import { Ajv2020 } from 'ajv/dist/2020.js';
import formatsModule from 'ajv-formats';
import draft2019Formats from 'ajv-formats-draft2019';

const addFormats = formatsModule.default;

export type JsonSchemaDraft = 'draft-07' | '2019-09' | '2020-12';

export const DEFAULT_DRAFT: JsonSchemaDraft = '2020-12';

/**
 * Draft named by `$schema`; schemas without one are read as 2020-12.
 * draft-04/06 URIs fall back to the draft-07 instance.
 */
export function detectDraft(schema: unknown): JsonSchemaDraft {
  if (typeof schema !== 'object' || schema === null) return DEFAULT_DRAFT;
  const uri: unknown = Reflect.get(schema, '$schema');
  if (typeof uri !== 'string') return DEFAULT_DRAFT;
  const lowered = uri.toLowerCase();
  if (lowered.includes('2020-12')) return '2020-12';
  if (lowered.includes('2019-09')) return '2019-09';
  if (
    lowered.includes('draft-07') ||
    lowered.includes('draft-06') ||
    lowered.includes('draft-04')
  ) {
    return 'draft-07';
  }
  return DEFAULT_DRAFT;
}

const BASE_OPTIONS = {
  allErrors: true,
  verbose: true,
  strict: true,
  strictTypes: 'log',
  strictTuples: false,
  strictRequired: false,
  allowUnionTypes: true,
  validateFormats: true,
  // compiled validators are owned by the schema cache, not Ajv's registry
  addUsedSchema: false,
  messages: true,
  logger: false,
} as const satisfies Options;

export function createAjv(draft: JsonSchemaDraft): Ajv {
  switch (draft) {
    case 'draft-07': {
      const ajv = new Ajv(BASE_OPTIONS);
      addFormats(ajv);
      return ajv;
    }
    case '2019-09': {
      const ajv = new Ajv2019(BASE_OPTIONS);
      addFormats(ajv);
      draft2019Formats(ajv);
      return ajv;
    }
    case '2020-12': {
      const ajv = new Ajv2020(BASE_OPTIONS);
      addFormats(ajv);
      draft2019Formats(ajv);
      return ajv;
    }
    default: {
      const exhaustive: never = draft;
      return exhaustive;
    }
  }
}

/** One lazily created Ajv instance per draft */
export class AjvPool {
  readonly #instances = new Map<JsonSchemaDraft, Ajv>();

  forSchema(schema: unknown): Ajv {
    return this.forDraft(detectDraft(schema));
  }

  forDraft(draft: JsonSchemaDraft): Ajv {
    let ajv = this.#instances.get(draft);
    if (!ajv) {
      ajv = createAjv(draft);
      this.#instances.set(draft, ajv);
    }
    return ajv;
  }
}
