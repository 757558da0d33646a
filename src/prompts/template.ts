const PLACEHOLDER = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/** Replace `{name}` with `vars[name]`. Unknown placeholders stay as written. */
export function renderTemplate(template: string, vars: Record<string, string>): string {
  if (Object.keys(vars).length === 0) return template;
  return template.replace(PLACEHOLDER, (match, name: string) =>
    Object.hasOwn(vars, name) ? (vars[name] ?? match) : match,
  );
}
