import { isCollectionKind, type Kind } from '../inspect/kind.js';

export type MessageFn = (param: string, kind: Kind) => string;

/** Static text, or text computed from the rule parameter and field kind */
export type MessageOverride = string | MessageFn;

export type MessageOverrides = Readonly<Record<string, MessageOverride>>;

function sized(
  text: (param: string) => string,
  items: (param: string) => string,
  value: (param: string) => string
): MessageFn {
  return (param, kind) => {
    if (kind === 'string') return text(param);
    if (isCollectionKind(kind)) return items(param);
    return value(param);
  };
}

const DEFAULT_MESSAGES: Readonly<Record<string, MessageFn>> = {
  required: () => 'is required',
  min: sized(
    (p) => `must be at least ${p} characters long`,
    (p) => `must contain at least ${p} items`,
    (p) => `must be ${p} or greater`
  ),
  max: sized(
    (p) => `must be at most ${p} characters long`,
    (p) => `must contain at most ${p} items`,
    (p) => `must be ${p} or less`
  ),
  len: sized(
    (p) => `must be exactly ${p} characters long`,
    (p) => `must contain exactly ${p} items`,
    (p) => `must equal ${p}`
  ),
  gt: sized(
    (p) => `must be longer than ${p} characters`,
    (p) => `must contain more than ${p} items`,
    (p) => `must be greater than ${p}`
  ),
  gte: sized(
    (p) => `must be at least ${p} characters long`,
    (p) => `must contain at least ${p} items`,
    (p) => `must be ${p} or greater`
  ),
  lt: sized(
    (p) => `must be shorter than ${p} characters`,
    (p) => `must contain fewer than ${p} items`,
    (p) => `must be less than ${p}`
  ),
  lte: sized(
    (p) => `must be at most ${p} characters long`,
    (p) => `must contain at most ${p} items`,
    (p) => `must be ${p} or less`
  ),
  eq: (p) => `must equal ${p}`,
  ne: (p) => `must not equal ${p}`,
  oneof: (p) => `must be one of: ${p.split(/\s+/).join(', ')}`,
  email: () => 'must be a valid email address',
  url: () => 'must be a valid URL',
  uri: () => 'must be a valid URI',
  uuid: () => 'must be a valid UUID',
  ipv4: () => 'must be a valid IPv4 address',
  ipv6: () => 'must be a valid IPv6 address',
  hostname: () => 'must be a valid hostname',
  date: () => 'must be a valid date (YYYY-MM-DD)',
  datetime: () => 'must be a valid RFC 3339 date-time',
  time: () => 'must be a valid time',
  alpha: () => 'must contain only letters',
  alphanum: () => 'must contain only letters and digits',
  numeric: () => 'must be numeric',
  lowercase: () => 'must be lowercase',
  uppercase: () => 'must be uppercase',
  contains: (p) => `must contain "${p}"`,
  excludes: (p) => `must not contain "${p}"`,
  startswith: (p) => `must start with "${p}"`,
  endswith: (p) => `must end with "${p}"`,
  eqfield: (p) => `must equal ${p}`,
  nefield: (p) => `must not equal ${p}`,
  gtfield: (p) => `must be greater than ${p}`,
  gtefield: (p) => `must be greater than or equal to ${p}`,
  ltfield: (p) => `must be less than ${p}`,
  ltefield: (p) => `must be less than or equal to ${p}`,
};

/**
 * Message for a failed rule: caller override first, then the default table,
 * then a generic fallback naming the rule.
 */
export function resolveMessage(
  tag: string,
  param: string,
  kind: Kind,
  overrides: MessageOverrides = {}
): string {
  const override = Object.prototype.hasOwnProperty.call(overrides, tag)
    ? overrides[tag]
    : undefined;
  if (typeof override === 'string') return override;
  if (override) return override(param, kind);
  const builtin = Object.prototype.hasOwnProperty.call(DEFAULT_MESSAGES, tag)
    ? DEFAULT_MESSAGES[tag]
    : undefined;
  return builtin ? builtin(param, kind) : `failed on the "${tag}" rule`;
}
