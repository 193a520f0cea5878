/** Name of the parameter carrying the charset sentinel. */
export const SENTINEL_KEY = 'utf8';

/** `✓` percent-encoded as UTF-8. */
export const UTF8_SENTINEL_VALUE = '%E2%9C%93';

/** `&#10003;` percent-encoded, which is what a legacy form sends for `✓`. */
export const ISO_SENTINEL_VALUE = '%26%2310003%3B';
