/**
 * View
 *
 * Rendering helpers that decorators reach through their helper proxy.
 */

export {
  ViewHelpers,
  SafeHtml,
  escape,
  raw,
  contentTag,
  linkTo,
  truncate,
  type TagAttributes,
  type TruncateOptions,
  type LocalizeOptions,
  type Translations,
  type CustomHelper,
  type ViewHelpersOptions,
} from './helpers.ts';
export { getViewHelpers, setViewHelpers, withViewHelpers } from './context.ts';
