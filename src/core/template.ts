export type TemplateContext = Record<string, string | undefined>;

/** Replace `{{NAME}}` placeholders. Unknown names are left as written. */
export function renderTemplate(content: string, context: TemplateContext): string {
  return content.replace(/\{\{(\w+)\}\}/g, (_match, key: string) => {
    return context[key] ?? `{{${key}}}`;
  });
}
