/**
 * Structured field content: repetitions of components of subcomponents.
 * Leaves hold unescaped text. A field with a single non-empty leaf is
 * `[[['text']]]`; the empty field is `[[['']]]`.
 */
export type FieldValue = string[][][];

export function emptyField(): FieldValue {
  return [[['']]];
}

export function textField(text: string): FieldValue {
  return [[[text]]];
}

/**
 * One repetition whose components each hold a single subcomponent.
 */
export function componentsField(components: readonly string[]): FieldValue {
  return [components.map((c) => [c])];
}

export function isEmptyFieldValue(value: FieldValue | undefined): boolean {
  if (!value) return true;
  return value.every((rep) => rep.every((comp) => comp.every((sub) => sub === '')));
}

function trimTrailing<T>(items: T[], isEmpty: (item: T) => boolean, emptyItem: () => T): T[] {
  const trimmed = [...items];
  while (trimmed.length > 1) {
    const last = trimmed[trimmed.length - 1];
    if (last === undefined || !isEmpty(last)) break;
    trimmed.pop();
  }
  return trimmed.length > 0 ? trimmed : [emptyItem()];
}

function isBlankComponent(comp: readonly string[] | undefined): boolean {
  return comp !== undefined && comp.length === 1 && comp[0] === '';
}

/**
 * Canonical form: trailing empty subcomponents, components and
 * repetitions dropped (at least one of each kept). Returns a copy.
 */
export function normalizeFieldValue(value: FieldValue): FieldValue {
  const reps = value.map((rep) =>
    trimTrailing(
      rep.map((comp) => trimTrailing(comp, (s) => s === '', () => '')),
      isBlankComponent,
      () => ['']
    )
  );
  return trimTrailing(
    reps,
    (rep) => rep.length === 1 && isBlankComponent(rep[0]),
    () => [['']]
  );
}

export function cloneFieldValue(value: FieldValue): FieldValue {
  return value.map((rep) => rep.map((comp) => [...comp]));
}

export function fieldValuesEqual(a: FieldValue | undefined, b: FieldValue | undefined): boolean {
  if (isEmptyFieldValue(a) && isEmptyFieldValue(b)) return true;
  if (!a || !b) return false;
  const left = normalizeFieldValue(a);
  const right = normalizeFieldValue(b);
  return JSON.stringify(left) === JSON.stringify(right);
}

/**
 * Leaf text by 1-based repetition, component and subcomponent; '' when absent.
 */
export function getLeaf(value: FieldValue | undefined, component = 1, subcomponent = 1, repetition = 1): string {
  return value?.[repetition - 1]?.[component - 1]?.[subcomponent - 1] ?? '';
}
