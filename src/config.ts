import * as fs from "node:fs";
import * as path from "node:path";
import * as yaml from "yaml";
import { z } from "zod";
import { ConfigError } from "./errors";
import type { MerkleFunnelInit } from "./types";

const ConfigSchema = z
  .object({
    hashAlgo: z.enum(["sha256", "blake3"]),
    pairEncoding: z.enum(["raw", "hex"]),
    logLevel: z.enum(["error", "warn", "info", "verbose", "debug", "silly"]),
  })
  .strict();

/** A single layer (file, env) may set any subset of the keys */
const LayerSchema = ConfigSchema.partial();

export type MerkleFunnelConfig = z.infer<typeof ConfigSchema>;
type ConfigLayer = z.infer<typeof LayerSchema>;

const defaults: MerkleFunnelConfig = {
  hashAlgo: "sha256",
  pairEncoding: "raw",
  logLevel: "info",
};

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

function parseLayer(source: string, raw: unknown): ConfigLayer {
  const result = LayerSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`${source}: ${describeIssues(result.error)}`);
  }
  return result.data;
}

function readYaml(filePath: string): ConfigLayer {
  const abs = path.resolve(process.cwd(), filePath);
  if (!fs.existsSync(abs)) return {};

  let parsed: unknown;
  try {
    parsed = yaml.parse(fs.readFileSync(abs, "utf8"));
  } catch (error) {
    throw new ConfigError(
      `cannot read ${abs}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }
  // an empty file parses to null
  return parsed == null ? {} : parseLayer(abs, parsed);
}

function readEnv(): ConfigLayer {
  const env = process.env;
  return parseLayer("environment", {
    hashAlgo: env["MERKLE_FUNNEL_HASH_ALGO"] || undefined,
    pairEncoding: env["MERKLE_FUNNEL_PAIR_ENCODING"] || undefined,
    logLevel: env["MERKLE_FUNNEL_LOG_LEVEL"] || undefined,
  });
}

class ConfigManagerClass {
  private _cfg?: Readonly<MerkleFunnelConfig>;

  /**
   * Resolves defaults ← MERKLE_FUNNEL_RC file ← env ← userCfg and
   * replaces any previously loaded configuration.
   */
  load(userCfg: MerkleFunnelInit = {}): Readonly<MerkleFunnelConfig> {
    const rc = process.env["MERKLE_FUNNEL_RC"];
    const fileCfg = rc ? readYaml(rc) : {};
    const envCfg = readEnv();
    const user = parseLayer("init options", userCfg);

    const merged: MerkleFunnelConfig = {
      hashAlgo:
        user.hashAlgo ?? envCfg.hashAlgo ?? fileCfg.hashAlgo ?? defaults.hashAlgo,
      pairEncoding:
        user.pairEncoding ??
        envCfg.pairEncoding ??
        fileCfg.pairEncoding ??
        defaults.pairEncoding,
      logLevel:
        user.logLevel ?? envCfg.logLevel ?? fileCfg.logLevel ?? defaults.logLevel,
    };

    this._cfg = Object.freeze(merged);
    return this._cfg;
  }

  /** Lazily loads file + env settings on first read */
  get cfg(): Readonly<MerkleFunnelConfig> {
    return this._cfg ?? this.load();
  }

  reset(): void {
    this._cfg = undefined;
  }
}

export const ConfigManager = new ConfigManagerClass();

export function initMerkleFunnel(
  cfg?: MerkleFunnelInit
): Readonly<MerkleFunnelConfig> {
  return ConfigManager.load(cfg);
}
