/**
 * Message interpolation
 *
 * Placeholders are written `%{name}`. A `%` that does not open a `%{...}` pair
 * is literal text, as is `%{}` and an unterminated `%{`.
 */

import { RenderError } from "../catalog/errors.js";

export type Bindings = Readonly<Record<string, string | number>>;

export type Segment =
  | { kind: "literal"; text: string }
  | { kind: "placeholder"; name: string };

export type RenderResult =
  | { success: true; value: string }
  | { success: false; error: RenderError };

/**
 * Split a template into literal and placeholder segments in one pass
 */
export function segments(template: string): Segment[] {
  const result: Segment[] = [];
  let literal = "";
  let pos = 0;

  while (pos < template.length) {
    const start = template.indexOf("%{", pos);
    if (start === -1) {
      literal += template.slice(pos);
      break;
    }

    const end = template.indexOf("}", start + 2);
    if (end === -1) {
      literal += template.slice(pos);
      break;
    }

    const name = template.slice(start + 2, end);
    if (name === "") {
      literal += template.slice(pos, end + 1);
    } else {
      literal += template.slice(pos, start);
      if (literal !== "") {
        result.push({ kind: "literal", text: literal });
        literal = "";
      }
      result.push({ kind: "placeholder", name });
    }
    pos = end + 1;
  }

  if (literal !== "") {
    result.push({ kind: "literal", text: literal });
  }
  return result;
}

/**
 * Names of the placeholders used in a template, in order of first appearance
 *
 * @example placeholders("Hi %{name}, you have %{count} items") // Set {"name", "count"}
 */
export function placeholders(template: string): Set<string> {
  const names = new Set<string>();
  for (const segment of segments(template)) {
    if (segment.kind === "placeholder") {
      names.add(segment.name);
    }
  }
  return names;
}

/**
 * Substitute bindings into a template
 *
 * Fails if any placeholder is unbound, reporting every missing name together
 * with the partially rendered text.
 */
export function render(template: string, bindings: Bindings): RenderResult {
  let value = "";
  const missing = new Set<string>();

  for (const segment of segments(template)) {
    if (segment.kind === "literal") {
      value += segment.text;
    } else if (Object.hasOwn(bindings, segment.name)) {
      value += String(bindings[segment.name]);
    } else {
      missing.add(segment.name);
      value += `%{${segment.name}}`;
    }
  }

  if (missing.size > 0) {
    return { success: false, error: new RenderError(missing, value) };
  }
  return { success: true, value };
}
