import { ConfigurationError, type InputVariable } from "agentry-shared";

type Segment = { kind: "text"; value: string } | { kind: "placeholder"; name: string };

/**
 * Split a prompt template into text and `{{ name }}` placeholders.
 *
 * @throws ConfigurationError for an unterminated or empty placeholder
 */
export function parseTemplate(template: string): Segment[] {
  const segments: Segment[] = [];
  let cursor = 0;

  while (cursor < template.length) {
    const open = template.indexOf("{{", cursor);
    if (open === -1) {
      segments.push({ kind: "text", value: template.slice(cursor) });
      break;
    }
    if (open > cursor) {
      segments.push({ kind: "text", value: template.slice(cursor, open) });
    }
    const close = template.indexOf("}}", open + 2);
    if (close === -1) {
      throw new ConfigurationError(
        `Prompt template has an unterminated placeholder at position ${open}`,
        "CONFIG_TEMPLATE",
        { position: open },
      );
    }
    const name = template.slice(open + 2, close).trim();
    if (!name) {
      throw new ConfigurationError(
        `Prompt template has an empty placeholder at position ${open}`,
        "CONFIG_TEMPLATE",
        { position: open },
      );
    }
    segments.push({ kind: "placeholder", name });
    cursor = close + 2;
  }

  return segments;
}

/**
 * Names referenced by a template, in order of first use.
 */
export function templateVariables(template: string): string[] {
  const names = new Set<string>();
  for (const segment of parseTemplate(template)) {
    if (segment.kind === "placeholder") names.add(segment.name);
  }
  return Array.from(names);
}

/**
 * Check that every placeholder names a declared input variable.
 */
export function validateTemplate(template: string, variables: readonly InputVariable[]): void {
  const declared = new Set(variables.map((v) => v.name));
  const undeclared = templateVariables(template).filter((name) => !declared.has(name));
  if (undeclared.length > 0) {
    throw new ConfigurationError(
      `Prompt template references undeclared variables: ${undeclared.join(", ")}`,
      "CONFIG_TEMPLATE",
      { undeclared },
    );
  }
}

/**
 * Render the system prompt of a run. Optional variables without a value
 * render as empty strings.
 */
export function renderPrompt(
  template: string,
  variables: readonly InputVariable[],
  values: Readonly<Record<string, string>>,
): string {
  validateTemplate(template, variables);
  return parseTemplate(template)
    .map((segment) => (segment.kind === "text" ? segment.value : (values[segment.name] ?? "")))
    .join("");
}
