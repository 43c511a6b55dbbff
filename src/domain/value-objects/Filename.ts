/**
 * Pure file name derivation: sanitization, URL segments and Content-Disposition.
 *
 * Every helper returns an empty string when nothing usable is found; callers
 * decide whether an empty name is fatal.
 */
export class Filename {
  /**
   * Characters no mainstream filesystem accepts in a file name. The Windows set
   * is used on every platform so a name derived here is portable.
   */
  private static readonly INVALID_CHARS = /[<>:"/\\|?*\x00-\x1f]/g;
  private static readonly SEGMENT_SEPARATORS = /[/\\]/;
  private static readonly EXTENDED_VALUE = /^([^']*)'([^']*)'(.*)$/;
  private static readonly DISPOSITION_PARAM = /;\s*([^\s=;]+)\s*=\s*("(?:[^"\\]|\\.)*"|[^;]*)/g;

  private constructor() {}

  /**
   * Replace invalid characters with a space and trim. Names made only of dots
   * would address a directory and come back empty.
   */
  static sanitize(name: string): string {
    const sanitized = name.replace(Filename.INVALID_CHARS, ' ').trim();
    return /^\.+$/.test(sanitized) ? '' : sanitized;
  }

  /**
   * Percent-decode, leaving the input untouched when it is not valid encoding
   */
  static decode(text: string, charset: string = 'utf-8'): string {
    if (!text.includes('%')) {
      return text;
    }

    if (isLatin1(charset)) {
      return decodeLatin1(text);
    }

    try {
      return decodeURIComponent(text);
    } catch (error) {
      if (error instanceof URIError) {
        return text;
      }
      throw error;
    }
  }

  /**
   * Last `/` or `\` separated segment of a path
   */
  static lastSegment(path: string): string {
    const segments = path.split(Filename.SEGMENT_SEPARATORS);
    return segments[segments.length - 1] ?? '';
  }

  /**
   * Name taken from the last path segment of a URL, query and fragment removed
   */
  static fromUrl(uri: string): string {
    return Filename.sanitize(Filename.decode(Filename.lastSegment(urlPath(uri))));
  }

  /**
   * Name taken from a Content-Disposition header value. `filename*` wins over
   * `filename` when both are present.
   */
  static fromContentDisposition(header: string | null | undefined): string {
    if (!header) {
      return '';
    }

    const params = Filename.parseDispositionParams(header);
    const extended = params.get('filename*');
    const plain = params.get('filename');

    let raw: string | undefined;
    let charset = 'utf-8';

    if (extended !== undefined) {
      const match = Filename.EXTENDED_VALUE.exec(extended);
      if (match) {
        charset = match[1] || charset;
        raw = match[3];
      } else {
        raw = extended;
      }
    }

    if (!raw && plain !== undefined) {
      raw = plain;
      charset = 'utf-8';
    }

    if (!raw) {
      return '';
    }

    return Filename.sanitize(Filename.lastSegment(Filename.decode(raw, charset)));
  }

  /**
   * Parameters of a Content-Disposition value, keyed by lower-cased name
   */
  static parseDispositionParams(header: string): Map<string, string> {
    const params = new Map<string, string>();
    const pattern = new RegExp(Filename.DISPOSITION_PARAM.source, 'g');
    const input = `;${header}`;

    let match: RegExpExecArray | null;
    while ((match = pattern.exec(input)) !== null) {
      const name = match[1].toLowerCase();
      if (!params.has(name)) {
        params.set(name, unquote(match[2].trim()));
      }
    }

    return params;
  }
}

/**
 * Inputs to file name derivation, in priority order
 */
export interface FileNameSources {
  explicitFileName?: string;
  contentDisposition?: string | null;
  /**
   * Post-redirect URL; absent when resolution never got a response
   */
  effectiveUri?: string;
  originalUri: string;
}

/**
 * First non-empty name from: explicit name, Content-Disposition,
 * effective URL, original URL.
 */
export function deriveFileName(sources: FileNameSources): string {
  const explicit = sources.explicitFileName?.trim();
  if (explicit) {
    return explicit;
  }

  const fromDisposition = Filename.fromContentDisposition(sources.contentDisposition);
  if (fromDisposition) {
    return fromDisposition;
  }

  if (sources.effectiveUri) {
    const fromEffective = Filename.fromUrl(sources.effectiveUri);
    if (fromEffective) {
      return fromEffective;
    }
  }

  return Filename.fromUrl(sources.originalUri);
}

function urlPath(uri: string): string {
  if (URL.canParse(uri)) {
    return new URL(uri).pathname;
  }
  // Not an absolute URL: cut query and fragment by hand
  const end = uri.search(/[?#]/);
  return end === -1 ? uri : uri.substring(0, end);
}

function unquote(value: string): string {
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value.slice(1, -1).replace(/\\(.)/g, '$1');
  }
  return value;
}

function isLatin1(charset: string): boolean {
  return ['iso-8859-1', 'latin1', 'us-ascii'].includes(charset.toLowerCase());
}

function decodeLatin1(text: string): string {
  return text.replace(/%([0-9a-fA-F]{2})/g, (_match, hex: string) =>
    String.fromCharCode(parseInt(hex, 16))
  );
}
