/**
 * Declared field rules: the tag-style annotations of a record type.
 *
 * A rule is either a tag string (`"required,min=3"`) or a descriptor that
 * also renames the field, describes a nested object, or applies rules to
 * every element of an array / value of a map.
 */

export interface FieldRule {
  /** Comma-separated rule tags, e.g. `"required,email"` */
  readonly rules?: string;
  /** Serialized name used in paths; defaults to the property key */
  readonly name?: string;
  /** Rules for the properties of a nested object */
  readonly fields?: FieldRules;
  /** Rules applied to every array element or map value */
  readonly each?: string | FieldRule;
}

export type FieldRules = { readonly [property: string]: string | FieldRule };

export type RecordConstructor = abstract new (...args: never[]) => object;

const registered = new WeakMap<object, FieldRules>();

export function toFieldRule(spec: string | FieldRule): FieldRule {
  return typeof spec === 'string' ? { rules: spec } : spec;
}

export function isFieldRules(value: unknown): value is FieldRules {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  return Object.values(value).every(
    (spec) =>
      typeof spec === 'string' || (typeof spec === 'object' && spec !== null)
  );
}

/**
 * Attach rules to a class without touching its body. Subclasses inherit
 * them unless they register their own.
 */
export function defineFieldRules<C extends RecordConstructor>(
  ctor: C,
  rules: FieldRules
): C {
  registered.set(ctor, rules);
  return ctor;
}

/**
 * Rules declared for a record's type: registered through
 * `defineFieldRules`, or a static `fieldRules` property on the class.
 */
export function rulesFor(record: object): FieldRules | undefined {
  let proto: unknown = Object.getPrototypeOf(record);
  while (
    typeof proto === 'object' &&
    proto !== null &&
    proto !== Object.prototype
  ) {
    const ctor: unknown = Reflect.get(proto, 'constructor');
    if (typeof ctor === 'function') {
      const own = registered.get(ctor);
      if (own) return own;
      const declared: unknown = Reflect.get(ctor, 'fieldRules');
      if (isFieldRules(declared)) return declared;
    }
    proto = Object.getPrototypeOf(proto);
  }
  return undefined;
}
