/**
 * Presence-carrying container for settings fields.
 *
 * A field is either `absent` (no source decided anything about it) or
 * `present`, in which case its value may well be the empty string, zero,
 * `false` or an empty list. Merge, override and default logic only ever
 * looks at the tag, never at the value.
 */
export type Absent = { readonly kind: "absent" };
export type Present<T> = { readonly kind: "present"; readonly value: T };
export type Optional<T> = Absent | Present<T>;

const ABSENT: Absent = Object.freeze({ kind: "absent" });

export function absent<T = never>(): Optional<T> {
  return ABSENT;
}

export function present<T>(value: T): Optional<T> {
  return { kind: "present", value };
}

/** Wraps `undefined` as absent, anything else as present. */
export function fromUndefined<T>(value: T | undefined): Optional<T> {
  return value === undefined ? ABSENT : present(value);
}

export function isPresent<T>(field: Optional<T>): field is Present<T> {
  return field.kind === "present";
}

export function isAbsent<T>(field: Optional<T>): field is Absent {
  return field.kind === "absent";
}

export function valueOr<T>(field: Optional<T>, fallback: T): T {
  return field.kind === "present" ? field.value : fallback;
}

export function toUndefined<T>(field: Optional<T>): T | undefined {
  return field.kind === "present" ? field.value : undefined;
}

/** Keeps the receiver when present, otherwise takes `other` (which may be absent too). */
export function mergeOptional<T>(receiver: Optional<T>, other: Optional<T>, clone?: (value: T) => T): Optional<T> {
  if (receiver.kind === "present") {
    return copyOptional(receiver, clone);
  }
  return copyOptional(other, clone);
}

/** Takes `other` when present, otherwise keeps the receiver. */
export function overrideOptional<T>(receiver: Optional<T>, other: Optional<T>, clone?: (value: T) => T): Optional<T> {
  if (other.kind === "present") {
    return copyOptional(other, clone);
  }
  return copyOptional(receiver, clone);
}

export function defaultOptional<T>(receiver: Optional<T>, fallback: T, clone?: (value: T) => T): Optional<T> {
  if (receiver.kind === "present") {
    return copyOptional(receiver, clone);
  }
  return present(fallback);
}

export function copyOptional<T>(field: Optional<T>, clone?: (value: T) => T): Optional<T> {
  if (field.kind === "absent") {
    return ABSENT;
  }
  return present(clone ? clone(field.value) : field.value);
}

export function copyList<T>(list: readonly T[]): T[] {
  return [...list];
}
