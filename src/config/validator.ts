/**
 * Configuration validation
 */

import type { ConfigDocument } from "../types";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Validator = (config: Record<string, unknown>) => void;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim() !== "";
}

const validators: Record<"cloud" | "paths" | "objects", Validator> = {
  cloud: (c) => {
    const cloud = c.cloud;
    if (!isRecord(cloud)) {
      throw new ConfigError("Config must have a 'cloud' section");
    }
    if (!isNonEmptyString(cloud.provider)) {
      throw new ConfigError("Missing 'provider' in cloud section");
    }
    if (cloud.telegram !== undefined) {
      const telegram = cloud.telegram;
      const validRecord =
        isRecord(telegram) &&
        isNonEmptyString(telegram.token) &&
        (isNonEmptyString(telegram.chatId) || typeof telegram.chatId === "number");
      if (typeof telegram !== "string" && !validRecord) {
        throw new ConfigError(
          "cloud.telegram must be a 'token:chatId' string or an object with token and chatId",
        );
      }
    }
    if (
      cloud.keep !== undefined &&
      (typeof cloud.keep !== "number" || !Number.isInteger(cloud.keep) || cloud.keep < 1)
    ) {
      throw new ConfigError("cloud.keep must be a positive integer");
    }
  },

  paths: (c) => {
    const paths = c.paths;
    if (paths === undefined) {
      return;
    }
    if (!isRecord(paths)) {
      throw new ConfigError("paths must be an object");
    }
    for (const key of ["state", "scratch"] as const) {
      const value = paths[key];
      if (value !== undefined && !isNonEmptyString(value)) {
        throw new ConfigError(`paths.${key} must be a non-empty string`);
      }
    }
  },

  objects: (c) => {
    const objects: unknown = c.objects;
    if (!Array.isArray(objects)) {
      throw new ConfigError("Config must have an 'objects' list");
    }
    if (objects.length === 0) {
      throw new ConfigError("Config must list at least one tracked object");
    }
    objects.forEach((entry: unknown, i) => {
      if (typeof entry === "string") {
        return; // compact form, parsed during resolution
      }
      if (!isRecord(entry)) {
        throw new ConfigError(`objects[${i}] must be a string or an object`);
      }
      if (!isNonEmptyString(entry.path)) {
        throw new ConfigError(`objects[${i}].path must be a non-empty string`);
      }
      if (
        typeof entry.intervalDays !== "number" ||
        !Number.isInteger(entry.intervalDays) ||
        entry.intervalDays < 0
      ) {
        throw new ConfigError(`objects[${i}].intervalDays must be an integer >= 0`);
      }
      if (!isNonEmptyString(entry.remoteFolder)) {
        throw new ConfigError(`objects[${i}].remoteFolder must be a non-empty string`);
      }
    });
  },
};

/**
 * Validate the shape of a parsed config document
 */
export function validateConfig(config: unknown): asserts config is ConfigDocument {
  if (!isRecord(config)) {
    throw new ConfigError("Config must be an object");
  }

  validators.cloud(config);
  validators.paths(config);
  validators.objects(config);
}
