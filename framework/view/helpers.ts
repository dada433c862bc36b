/**
 * View Helpers
 *
 * The helper set decorators render with: escaping, tag and link builders,
 * truncation, localization and application-registered custom helpers.
 */

/**
 * Safe HTML content wrapper
 */
export class SafeHtml {
  constructor(public readonly content: string) {}

  toString(): string {
    return this.content;
  }
}

/**
 * Escape HTML entities
 */
export function escape(value: unknown): string {
  if (value instanceof SafeHtml) {
    return value.content;
  }

  return String(value ?? '')
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/**
 * Mark content as safe (no escaping)
 */
export function raw(content: string): SafeHtml {
  return new SafeHtml(content);
}

export type TagAttributes = Record<string, string | boolean | number | null | undefined>;

const VOID_ELEMENTS = new Set([
  'area', 'base', 'br', 'col', 'embed', 'hr', 'img', 'input', 'link', 'meta', 'source', 'track', 'wbr',
]);

/**
 * Build an HTML element. String content is escaped, SafeHtml is not.
 */
export function contentTag(
  tag: string,
  content: string | SafeHtml | (string | SafeHtml)[] = [],
  attributes: TagAttributes = {}
): SafeHtml {
  const attrs = Object.entries(attributes)
    .filter(([, value]) => value !== null && value !== undefined && value !== false)
    .map(([key, value]) => (value === true ? key : `${key}="${escape(String(value))}"`))
    .join(' ');

  const attrStr = attrs ? ` ${attrs}` : '';
  const children = Array.isArray(content) ? content : [content];

  if (VOID_ELEMENTS.has(tag.toLowerCase()) && children.length === 0) {
    return new SafeHtml(`<${tag}${attrStr} />`);
  }

  return new SafeHtml(`<${tag}${attrStr}>${children.map(escape).join('')}</${tag}>`);
}

export function linkTo(label: string | SafeHtml, href: string, attributes: TagAttributes = {}): SafeHtml {
  return contentTag('a', label, { href, ...attributes });
}

export interface TruncateOptions {
  length?: number;
  omission?: string;
}

/**
 * Shorten text to `length` characters including the omission marker
 */
export function truncate(text: string, options: TruncateOptions = {}): string {
  const length = options.length ?? 30;
  const omission = options.omission ?? '...';

  const characters = Array.from(text);
  if (characters.length <= length) return text;
  return characters.slice(0, Math.max(0, length - Array.from(omission).length)).join('') + omission;
}

export type Translations = Record<string, Record<string, string>>;

export interface LocalizeOptions {
  locale?: string;
  dateFormat?: Intl.DateTimeFormatOptions;
  numberFormat?: Intl.NumberFormatOptions;
  /** Interpolation values for translation keys */
  values?: Record<string, string | number>;
}

export type CustomHelper = (...args: unknown[]) => unknown;

export interface ViewHelpersOptions {
  locale?: string;
  translations?: Translations;
}

/**
 * Helper set bound to a locale and a translation table
 */
export class ViewHelpers {
  readonly locale: string;
  private translations: Translations;
  private custom = new Map<string, CustomHelper>();

  constructor(options: ViewHelpersOptions = {}) {
    this.locale = options.locale ?? 'en';
    this.translations = options.translations ?? {};
  }

  escape(value: unknown): string {
    return escape(value);
  }

  raw(content: string): SafeHtml {
    return raw(content);
  }

  contentTag(
    tag: string,
    content?: string | SafeHtml | (string | SafeHtml)[],
    attributes?: TagAttributes
  ): SafeHtml {
    return contentTag(tag, content, attributes);
  }

  linkTo(label: string | SafeHtml, href: string, attributes?: TagAttributes): SafeHtml {
    return linkTo(label, href, attributes);
  }

  truncate(text: string, options?: TruncateOptions): string {
    return truncate(text, options);
  }

  /**
   * Format a date or number for the locale, or look up a translation key.
   * Unknown keys come back unchanged.
   */
  localize(value: Date | number | string, options: LocalizeOptions = {}): string {
    const locale = options.locale ?? this.locale;

    if (value instanceof Date) {
      return new Intl.DateTimeFormat(locale, options.dateFormat).format(value);
    }
    if (typeof value === 'number') {
      return new Intl.NumberFormat(locale, options.numberFormat).format(value);
    }

    const template = this.translations[locale]?.[value];
    if (template === undefined) return value;

    return template.replace(/%\{(\w+)\}/g, (match, name: string) => {
      const replacement = options.values?.[name];
      return replacement === undefined ? match : String(replacement);
    });
  }

  /**
   * Register an application helper reachable through `call`
   */
  register(name: string, helper: CustomHelper): this {
    this.custom.set(name, helper);
    return this;
  }

  has(name: string): boolean {
    return this.custom.has(name);
  }

  call(name: string, ...args: unknown[]): unknown {
    const helper = this.custom.get(name);
    if (!helper) {
      throw new Error(`Unknown helper: ${name}`);
    }
    return helper(...args);
  }
}
