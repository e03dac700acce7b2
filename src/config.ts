import type { LibrarySettings } from "./types";
import { MAX_SEEN_HASHES } from "./constants";

const DEFAULT_SETTINGS: LibrarySettings = {
  logLevel: "warn",
  maxSeenHashes: MAX_SEEN_HASHES,
};

let settings: LibrarySettings = { ...DEFAULT_SETTINGS };

export const Settings = {
  /**
   * Override library-wide settings. Unspecified options keep their current value.
   */
  configure(configuration: Partial<LibrarySettings>): void {
    if (
      configuration.maxSeenHashes !== undefined &&
      (!Number.isInteger(configuration.maxSeenHashes) ||
        configuration.maxSeenHashes < 1)
    ) {
      throw new RangeError("maxSeenHashes must be a positive integer");
    }
    settings = { ...settings, ...configuration };
  },

  get(): Readonly<LibrarySettings> {
    return settings;
  },

  reset(): void {
    settings = { ...DEFAULT_SETTINGS };
  },
};
