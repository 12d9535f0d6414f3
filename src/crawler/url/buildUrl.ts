const PLACEHOLDER = /\{(?:id)?\}/g;

export function countPlaceholders(template: string): number {
  return template.match(PLACEHOLDER)?.length ?? 0;
}

/** Substitutes the identifier into a template such as `https://host/recipe/{}`. */
export function buildUrl(template: string, id: number): string {
  return template.replace(PLACEHOLDER, String(id));
}
