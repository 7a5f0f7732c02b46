import { UnmangleError } from "./errors";

export interface UnmangleConfig {
  /** Ask the assistant for function names */
  aiNames: boolean;
  /** Ask the assistant to comment each function */
  aiComments: boolean;
  /** Add a comment listing each function's callers */
  xrefs: boolean;
  /** Append `_xref_<calls>` to function names */
  xrefSuffix: boolean;
  /** Names starting with this were chosen by hand and stay */
  manualPrefix: string;
  /** Function names and 1-based lines to restrict the run to */
  only: string[];
  model: string;
  /** Largest response the assistant may be asked for */
  maxTokens: number;
  temperature: number;
  apiKey?: string;
}

export const defaultConfig: UnmangleConfig = {
  aiNames: false,
  aiComments: false,
  xrefs: true,
  xrefSuffix: false,
  manualPrefix: "F_",
  only: [],
  model: "gpt-4",
  maxTokens: 8192,
  temperature: 0.2,
};

export function configFromEnv(
  env: Record<string, string | undefined>
): Partial<UnmangleConfig> {
  const ret: Partial<UnmangleConfig> = {};
  if (env.UNMANGLE_MODEL) ret.model = env.UNMANGLE_MODEL;
  if (env.OPENAI_API_KEY) ret.apiKey = env.OPENAI_API_KEY;
  return ret;
}

/** Defaults, then the environment, then explicit options */
export function resolveConfig(
  options: Partial<UnmangleConfig> = {},
  env: Record<string, string | undefined> = process.env
): UnmangleConfig {
  const config: UnmangleConfig = { ...defaultConfig, ...configFromEnv(env) };
  for (const [key, value] of Object.entries(options)) {
    if (value !== undefined) Object.assign(config, { [key]: value });
  }

  if (!Number.isInteger(config.maxTokens) || config.maxTokens <= 0) {
    throw new UnmangleError(
      `maxTokens must be a positive integer, got ${config.maxTokens}`
    );
  }
  if ((config.aiNames || config.aiComments) && !config.apiKey) {
    throw new UnmangleError(
      "OPENAI_API_KEY must be set to use the assistant"
    );
  }
  return config;
}

export function usesAssistant(config: UnmangleConfig) {
  return config.aiNames || config.aiComments;
}
