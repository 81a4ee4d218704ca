/**
 * slotlist - Configuration
 * Up-front validation and defaults for list configs
 */

import type {
  BaseListConfig,
  DisplayListConfig,
  Logger,
  ResolvedListConfig,
  Size,
} from "./types";
import { DEFAULT_DEBUG, DEFAULT_RESET_TRANSFORM } from "./constants";
import { invalidArgument } from "./errors";

const HOST_PRIMITIVES = [
  "createChild",
  "destroy",
  "setActive",
  "setSiblingOrder",
] as const;

const validateSize = (size: Size | undefined): void => {
  if (size === undefined) return;
  if (!Number.isFinite(size.width) || !Number.isFinite(size.height)) {
    throw invalidArgument("size.width and size.height must be finite numbers");
  }
  if (size.width < 0 || size.height < 0) {
    throw invalidArgument("size.width and size.height must not be negative");
  }
};

/**
 * Validate the options every list takes and fill in defaults.
 * Throws INVALID_ARGUMENT on the first problem found.
 */
export const resolveBaseConfig = <P, V>(
  config: BaseListConfig<P, V>,
): ResolvedListConfig => {
  if (!config || typeof config !== "object") {
    throw invalidArgument("Configuration object is required");
  }
  if (!config.host) {
    throw invalidArgument("host is required");
  }
  for (const primitive of HOST_PRIMITIVES) {
    if (typeof config.host[primitive] !== "function") {
      throw invalidArgument(`host.${primitive} must be a function`);
    }
  }

  const logger: Logger = config.logger ?? console;

  return {
    logger,
    debug: config.debug ?? DEFAULT_DEBUG,
    resetTransform: DEFAULT_RESET_TRANSFORM,
    size: undefined,
  };
};

/** Resolve the config of a typed list (base options plus prefab settings) */
export const resolveDisplayListConfig = <P, V>(
  config: DisplayListConfig<P, V>,
): ResolvedListConfig => {
  const base = resolveBaseConfig(config);

  if (config.prefab === undefined || config.prefab === null) {
    throw invalidArgument("prefab is required");
  }
  validateSize(config.size);

  return {
    ...base,
    resetTransform: config.resetTransform ?? DEFAULT_RESET_TRANSFORM,
    size: config.size,
  };
};
