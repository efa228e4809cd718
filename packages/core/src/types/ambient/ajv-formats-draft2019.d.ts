// Ambient declaration for ajv-formats-draft2019 (no official @types)
declare module 'ajv-formats-draft2019' {
  import type { Ajv } from 'ajv';
  function draft2019Formats(ajv: Ajv, options?: { formats?: string[] }): Ajv;
  export = draft2019Formats;
}
