import { Ajv, type ValidateFunction } from 'ajv';
import formatsModule from 'ajv-formats';

const addFormats = formatsModule.default;

/** Tag names backed by an ajv-formats format */
export const FORMAT_TAGS = {
  email: 'email',
  url: 'url',
  uri: 'uri',
  uuid: 'uuid',
  ipv4: 'ipv4',
  ipv6: 'ipv6',
  hostname: 'hostname',
  date: 'date',
  datetime: 'date-time',
  time: 'time',
} as const;

export type FormatTag = keyof typeof FORMAT_TAGS;

let formatAjv: Ajv | undefined;
const checks = new Map<FormatTag, ValidateFunction<string>>();

function getFormatAjv(): Ajv {
  if (!formatAjv) {
    formatAjv = new Ajv({ strict: true, logger: false, validateFormats: true });
    addFormats(formatAjv);
  }
  return formatAjv;
}

export function isFormatTag(name: string): name is FormatTag {
  return Object.prototype.hasOwnProperty.call(FORMAT_TAGS, name);
}

/** Whether `value` is a string in the given format */
export function matchesFormat(tag: FormatTag, value: unknown): boolean {
  if (typeof value !== 'string') return false;
  let check = checks.get(tag);
  if (!check) {
    check = getFormatAjv().compile<string>({
      type: 'string',
      format: FORMAT_TAGS[tag],
    });
    checks.set(tag, check);
  }
  return check(value);
}
