/**
 * Helper Proxy
 *
 * A decorator's handle on the view helpers. Every call goes to the helper
 * set installed for the current view; localization picks up the owner's
 * `locale` context.
 */

import type { SafeHtml, TagAttributes, TruncateOptions, LocalizeOptions, ViewHelpers } from '../view/helpers.ts';
import { NoMethodError } from './errors.ts';
import type { DecoratorContext } from './types.ts';

const BUILT_IN_HELPERS = new Set(['escape', 'raw', 'contentTag', 'linkTo', 'truncate', 'localize', 'l']);

export class HelperProxy {
  constructor(
    private readonly currentHelpers: () => ViewHelpers,
    private readonly owner?: { readonly context: DecoratorContext }
  ) {}

  private get helpers(): ViewHelpers {
    return this.currentHelpers();
  }

  escape(value: unknown): string {
    return this.helpers.escape(value);
  }

  raw(content: string): SafeHtml {
    return this.helpers.raw(content);
  }

  contentTag(
    tag: string,
    content?: string | SafeHtml | (string | SafeHtml)[],
    attributes?: TagAttributes
  ): SafeHtml {
    return this.helpers.contentTag(tag, content, attributes);
  }

  linkTo(label: string | SafeHtml, href: string, attributes?: TagAttributes): SafeHtml {
    return this.helpers.linkTo(label, href, attributes);
  }

  truncate(text: string, options?: TruncateOptions): string {
    return this.helpers.truncate(text, options);
  }

  localize(value: Date | number | string, options: LocalizeOptions = {}): string {
    const locale = options.locale ?? this.owner?.context.locale;
    return this.helpers.localize(value, locale === undefined ? options : { ...options, locale });
  }

  l(value: Date | number | string, options?: LocalizeOptions): string {
    return this.localize(value, options);
  }

  respondTo(name: string): boolean {
    return BUILT_IN_HELPERS.has(name) || this.helpers.has(name);
  }

  /**
   * Call a custom helper registered on the view helpers
   */
  invoke(name: string, ...args: unknown[]): unknown {
    if (!this.helpers.has(name)) {
      throw new NoMethodError(name, 'HelperProxy');
    }
    return this.helpers.call(name, ...args);
  }
}
