import { ConfigurationError } from "./errors.js";

const PLACEHOLDER_PATTERN = /\{\{\s*([a-z0-9_]+)\s*\}\}/gu;

/** A prompt template whose placeholders were checked against a known set when it was loaded. */
export type PromptTemplate<K extends string> = {
  readonly text: string;
  readonly placeholders: readonly K[];
};

export function listPlaceholders(text: string): string[] {
  const names = new Set<string>();
  for (const match of text.matchAll(PLACEHOLDER_PATTERN)) {
    const name = match[1];
    if (name) {
      names.add(name);
    }
  }
  return [...names];
}

export function compileTemplate<K extends string>(
  text: string,
  allowed: readonly K[],
  label: string,
): PromptTemplate<K> {
  const placeholders: K[] = [];
  const unknown: string[] = [];
  for (const name of listPlaceholders(text)) {
    const known = allowed.find((candidate) => candidate === name);
    if (known !== undefined) {
      placeholders.push(known);
    } else {
      unknown.push(name);
    }
  }
  if (unknown.length > 0) {
    throw new ConfigurationError(
      `Template "${label}" uses unknown placeholder(s) ${unknown.map((name) => `{{${name}}}`).join(", ")}; ` +
        `allowed: ${allowed.join(", ")}.`,
    );
  }
  return { text, placeholders };
}

export function renderTemplate<K extends string>(
  template: PromptTemplate<K>,
  values: Readonly<Record<K, string>>,
): string {
  return template.text.replace(PLACEHOLDER_PATTERN, (placeholder: string, name: string) => {
    const key = template.placeholders.find((candidate) => candidate === name);
    return key === undefined ? placeholder : values[key];
  });
}
