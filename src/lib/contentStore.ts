export type ContentErrorKind = 'NotFound' | 'MalformedData';

export class ContentError extends Error {
  readonly kind: ContentErrorKind;
  readonly path: string;

  constructor(kind: ContentErrorKind, path: string, message: string) {
    super(message);
    this.name = 'ContentError';
    this.kind = kind;
    this.path = path;
  }
}

export type LoadResult = { ok: true; sessions: unknown[] } | { ok: false; error: ContentError };

/**
 * Resolves to the file's text. Rejects with a NotFound ContentError when the
 * path can't be read; any other rejection is treated as a bug and propagates.
 */
export type TextReader = (path: string) => Promise<string>;

export const fetchText: TextReader = async (path) => {
  let res: Response;
  try {
    res = await fetch(path, { cache: 'no-cache' });
  } catch (e) {
    const why = e instanceof Error ? e.message : 'network error';
    throw new ContentError('NotFound', path, `The file ${path} could not be read (${why}).`);
  }
  if (!res.ok) throw new ContentError('NotFound', path, `The file ${path} was not found (HTTP ${res.status}).`);
  return res.text();
};

function parseSessionsDocument(path: string, body: string): unknown[] {
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch {
    throw new ContentError('MalformedData', path, `The file ${path} contains invalid JSON.`);
  }
  if (!Array.isArray(data)) {
    throw new ContentError('MalformedData', path, `Expected a JSON list of sessions in ${path}.`);
  }
  return data;
}

export type ContentStore = {
  load(path: string): Promise<LoadResult>;
  /** Drops every cached document (used by Retry after a fix on disk). */
  clear(): void;
};

/**
 * Loads session documents once per path.
 *
 * In-flight loads are shared, successful ones stay cached for the lifetime of
 * the store. Failures are evicted so the next load reads again.
 */
export function createContentStore(read: TextReader = fetchText): ContentStore {
  const cache = new Map<string, Promise<unknown[]>>();

  async function readOnce(path: string): Promise<unknown[]> {
    const body = await read(path);
    return parseSessionsDocument(path, body);
  }

  return {
    async load(path) {
      let pending = cache.get(path);
      if (!pending) {
        pending = readOnce(path);
        cache.set(path, pending);
      }
      try {
        return { ok: true, sessions: await pending };
      } catch (e) {
        if (cache.get(path) === pending) cache.delete(path);
        if (e instanceof ContentError) return { ok: false, error: e };
        throw e;
      }
    },
    clear() {
      cache.clear();
    },
  };
}

export function contentErrorMessage(err: ContentError): string {
  return err.kind === 'NotFound' ? `Missing content: ${err.message}` : `Broken content: ${err.message}`;
}
