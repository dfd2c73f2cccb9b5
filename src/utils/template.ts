export type PlaceholderValues = Record<string, string | number>;

/** Replaces `{name}` tokens whose name is in `values`; other braces are left alone. */
export function expandPlaceholders(template: string, values: PlaceholderValues): string {
  return template.replace(/\{(\w+)\}/g, (match, name: string) => {
    const value = values[name];
    return value !== undefined ? String(value) : match;
  });
}

export function expandArgs(args: readonly string[], values: PlaceholderValues): string[] {
  return args.map(arg => expandPlaceholders(arg, values));
}
