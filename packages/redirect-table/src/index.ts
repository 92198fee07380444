export {
  DEFAULT_REDIRECT_TTL_SECONDS,
  RedirectTableSettingsSchema,
  type RedirectEntry,
  type RedirectFallback,
  type RedirectResolution,
  type RedirectTableOptions,
  type RedirectTableSettings
} from './contracts';
export {RedirectTableError, type RedirectTableErrorCode} from './errors';
export {RedirectTable, slashPrefixesOf} from './table';
