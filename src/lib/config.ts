export const DEFAULT_CONTENT_PATH = '/learning.json';

export function contentPathFrom(env: { VITE_CONTENT_PATH?: string }): string {
  const p = (env.VITE_CONTENT_PATH ?? '').trim();
  return p || DEFAULT_CONTENT_PATH;
}
