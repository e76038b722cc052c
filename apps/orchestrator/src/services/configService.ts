import os from "node:os";
import path from "node:path";

import { ZodError } from "zod";

import { parseOrchestratorConfig, type OrchestratorConfig } from "@relaycam/shared";

import { ConfigurationError } from "../errors.js";

type Env = Record<string, string | undefined>;

const VARIABLE_PATTERN = /\$(?:\{([A-Za-z_][A-Za-z0-9_]*)\}|([A-Za-z_][A-Za-z0-9_]*))/g;

/**
 * Expands `$VAR` / `${VAR}` against `env` and a leading `~` to the home
 * directory. Unknown variables are left untouched.
 */
export const expandValue = (value: string, env: Env): string => {
  const expanded = value.replace(
    VARIABLE_PATTERN,
    (match: string, braced: string | undefined, bare: string | undefined) => {
      const name = braced ?? bare;
      const replacement = name ? env[name] : undefined;
      return replacement ?? match;
    }
  );

  if (expanded === "~" || expanded.startsWith("~/")) {
    return path.join(os.homedir(), expanded.slice(1));
  }

  return expanded;
};

export const expandEnv = (env: Env): Env => {
  const result: Env = {};
  for (const [key, value] of Object.entries(env)) {
    result[key] = value === undefined ? undefined : expandValue(value, env);
  }
  return result;
};

const describeIssues = (error: ZodError): string => {
  return error.issues
    .map((issue) => {
      const key = issue.path.join(".");
      return issue.message.includes(key) || !key ? issue.message : `${key}: ${issue.message}`;
    })
    .join("; ");
};

export const parseConfig = (env: Env): OrchestratorConfig => {
  try {
    return parseOrchestratorConfig(expandEnv(env));
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigurationError(describeIssues(error), { cause: error });
    }

    throw error;
  }
};

export const loadConfig = (): OrchestratorConfig => parseConfig(process.env);
