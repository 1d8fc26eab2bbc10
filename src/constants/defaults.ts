/**
 * How many supertype edges the resolver follows before giving up and
 * falling back to the top type.
 */
export const DEFAULT_MAX_RESOLUTION_DEPTH = 64;

/**
 * Placeholder syntax understood by PropertyParser
 */
export const DEFAULT_OPEN_TOKEN = '${';
export const DEFAULT_CLOSE_TOKEN = '}';

/**
 * Separator between a placeholder name and its default value, e.g. `${host:localhost}`
 */
export const DEFAULT_VALUE_SEPARATOR = ':';
