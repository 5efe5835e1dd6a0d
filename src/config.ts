import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import dotenv from 'dotenv';
import { z } from 'zod';
import { DEFAULT_DECODED_STEM, DEFAULT_STEGO_NAME } from './steganography/index.js';

export const CONFIG_DIR = path.join(os.homedir(), '.lsbmp');
export const CONFIG_FILE = path.join(CONFIG_DIR, 'config.json');

const ConfigFields = z.object({
  defaultStegoName: z.string().min(1).max(255).regex(/\.bmp$/i, 'must end in .bmp'),
  defaultDecodedStem: z.string().min(1).max(255).regex(/^[^./\\]+$/, 'must not contain dots or path separators'),
  confirmOverwrite: z.boolean(),
});

export type Config = z.infer<typeof ConfigFields>;

// config.json may set any subset of the fields
const FileConfigSchema = ConfigFields.partial().strict();

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const EnvConfigSchema = z.object({
  LSBMP_DEFAULT_STEGO: ConfigFields.shape.defaultStegoName.optional(),
  LSBMP_DEFAULT_STEM: ConfigFields.shape.defaultDecodedStem.optional(),
  LSBMP_CONFIRM_OVERWRITE: booleanFlag.optional(),
});

export const DEFAULT_CONFIG: Config = {
  defaultStegoName: DEFAULT_STEGO_NAME,
  defaultDecodedStem: DEFAULT_DECODED_STEM,
  confirmOverwrite: true,
};

export interface LoadConfigOptions {
  configFile?: string;
  env?: Record<string, string | undefined>;
}

export interface LoadedConfig {
  config: Config;
  /** Problems found in config.json or the environment; those layers are skipped */
  warnings: string[];
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'value'} ${issue.message}`)
    .join('; ');
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function readConfigFile(configFile: string, warnings: string[]): Promise<Partial<Config>> {
  let raw: string;
  try {
    raw = await fs.readFile(configFile, 'utf-8');
  } catch (error) {
    if (!isMissingFile(error)) {
      const reason = error instanceof Error ? error.message : String(error);
      warnings.push(`Could not read ${configFile}: ${reason}`);
    }
    return {};
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    warnings.push(`Ignoring ${configFile}: not valid JSON`);
    return {};
  }

  const parsed = FileConfigSchema.safeParse(json);
  if (!parsed.success) {
    warnings.push(`Ignoring ${configFile}: ${formatIssues(parsed.error)}`);
    return {};
  }
  return parsed.data;
}

function readEnvironment(env: Record<string, string | undefined>, warnings: string[]): Partial<Config> {
  const parsed = EnvConfigSchema.safeParse(env);
  if (!parsed.success) {
    warnings.push(`Ignoring LSBMP_* environment settings: ${formatIssues(parsed.error)}`);
    return {};
  }

  const overrides: Partial<Config> = {};
  if (parsed.data.LSBMP_DEFAULT_STEGO !== undefined) {
    overrides.defaultStegoName = parsed.data.LSBMP_DEFAULT_STEGO;
  }
  if (parsed.data.LSBMP_DEFAULT_STEM !== undefined) {
    overrides.defaultDecodedStem = parsed.data.LSBMP_DEFAULT_STEM;
  }
  if (parsed.data.LSBMP_CONFIRM_OVERWRITE !== undefined) {
    overrides.confirmOverwrite = parsed.data.LSBMP_CONFIRM_OVERWRITE;
  }
  return overrides;
}

/**
 * Load .env from the working directory into process.env
 */
export function loadEnvironment(): void {
  dotenv.config();
}

/**
 * Defaults, then ~/.lsbmp/config.json, then LSBMP_* environment variables
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const warnings: string[] = [];
  const fromFile = await readConfigFile(options.configFile ?? CONFIG_FILE, warnings);
  const fromEnv = readEnvironment(options.env ?? process.env, warnings);

  return {
    config: { ...DEFAULT_CONFIG, ...fromFile, ...fromEnv },
    warnings,
  };
}
