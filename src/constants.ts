/**
 * slotlist - Constants
 * Default values in one place
 */

/** Prefix for every log line and error message */
export const LOG_PREFIX = "[slotlist]";

/** New instances get an identity transform unless told otherwise */
export const DEFAULT_RESET_TRANSFORM = true;

/** Debug output is off by default */
export const DEFAULT_DEBUG = false;

/** Hidden attribute name used by the DOM host */
export const DOM_SLOT_ATTRIBUTE = "data-slot";
