import get from "lodash.get";

export type TemplateContext = Record<string, unknown>;

/**
 * Replace every `{{path}}` in the template with the value found at that path
 * in the context (lodash.get syntax). Missing values render as an empty
 * string; nothing is evaluated.
 */
export function renderTemplate(template: string, context: TemplateContext): string {
  return template.replace(/\{\{([^}]+)\}\}/g, (_match, expression: string) => {
    const value: unknown = get(context, expression.trim());
    return value === undefined || value === null ? "" : String(value);
  });
}

/** Render one template per item and join the results. */
export function renderEach<T extends TemplateContext>(template: string, items: Iterable<T>, separator = ""): string {
  const parts: string[] = [];
  for (const item of items) parts.push(renderTemplate(template, item));
  return parts.join(separator);
}
