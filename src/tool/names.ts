// pattern: Functional Core

// Some model APIs only accept tool names matching ^[a-zA-Z0-9_-]+$.
const DOT = '.';
const DOT_REPLACEMENT = '-_-';

export function sanitizeToolName(name: string): string {
  return name.split(DOT).join(DOT_REPLACEMENT);
}

export function desanitizeToolName(name: string): string {
  return name.split(DOT_REPLACEMENT).join(DOT);
}
