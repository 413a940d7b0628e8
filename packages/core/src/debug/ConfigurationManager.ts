/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'node:fs';
import { z } from 'zod';

import {
  getDefaultLogDirectory,
  getProjectConfigPath,
  getUserSettingsPath,
} from '../utils/paths.js';
import { LOG_LEVELS, type DebugSettings } from './types.js';

const partialSettingsSchema = z
  .object({
    enabled: z.boolean(),
    namespaces: z.array(z.string()),
    level: z.enum(LOG_LEVELS),
    output: z.union([
      z.string(),
      z.object({
        target: z.string(),
        directory: z.string().optional(),
        file: z.string().optional(),
      }),
    ]),
    colors: z.boolean(),
    redactPatterns: z.array(z.string()),
  })
  .partial();

const settingsFileSchema = z.object({
  debug: partialSettingsSchema.optional(),
});

export class ConfigurationManager {
  private static instance: ConfigurationManager | undefined;

  private readonly defaultConfig: DebugSettings;
  private projectConfig: Partial<DebugSettings> | null = null;
  private userConfig: Partial<DebugSettings> | null = null;
  private envConfig: Partial<DebugSettings> | null = null;
  private cliConfig: Partial<DebugSettings> | null = null;
  private ephemeralConfig: Partial<DebugSettings> | null = null;
  private mergedConfig: DebugSettings;
  private readonly listeners = new Set<() => void>();

  static getInstance(): ConfigurationManager {
    if (!ConfigurationManager.instance) {
      ConfigurationManager.instance = new ConfigurationManager();
    }
    return ConfigurationManager.instance;
  }

  static resetForTesting(): void {
    ConfigurationManager.instance = undefined;
  }

  private constructor() {
    this.defaultConfig = {
      enabled: false,
      namespaces: [],
      level: 'warn',
      output: { target: 'stderr', directory: getDefaultLogDirectory() },
      colors: false,
      redactPatterns: ['token', 'password', 'secret'],
    };
    this.mergedConfig = { ...this.defaultConfig };
    this.loadConfigurations();
    this.mergeConfigurations();
  }

  loadConfigurations(): void {
    this.loadEnvironmentConfig();
    this.userConfig = this.loadFileConfig(getUserSettingsPath());
    this.projectConfig = this.loadFileConfig(getProjectConfigPath());
  }

  // KEYWRIGHT_DEBUG wins over DEBUG; DEBUG only counts for our namespaces.
  private loadEnvironmentConfig(): void {
    this.envConfig = null;

    if (process.env.DEBUG) {
      const namespaces = this.parseDebugEnv(process.env.DEBUG).filter(
        (ns) => ns.startsWith('keywright') || ns === '*',
      );
      if (namespaces.length > 0) {
        this.envConfig = { enabled: true, namespaces };
      }
    }

    if (process.env.KEYWRIGHT_DEBUG) {
      this.envConfig = {
        enabled: true,
        namespaces: this.parseDebugEnv(process.env.KEYWRIGHT_DEBUG),
      };
    }

    const level = LOG_LEVELS.find((l) => l === process.env.DEBUG_LEVEL);
    if (level) {
      this.envConfig = { ...this.envConfig, level };
    }

    if (process.env.DEBUG_OUTPUT) {
      this.envConfig = {
        ...this.envConfig,
        output: { target: process.env.DEBUG_OUTPUT },
      };
    }
  }

  private loadFileConfig(
    configPath: string | undefined,
  ): Partial<DebugSettings> | null {
    if (!configPath || !fs.existsSync(configPath)) {
      return null;
    }
    try {
      const raw: unknown = JSON.parse(fs.readFileSync(configPath, 'utf8'));
      const parsed = settingsFileSchema.safeParse(raw);
      if (!parsed.success) {
        process.stderr.write(
          `Ignoring debug settings in ${configPath}: ${parsed.error.message}\n`,
        );
        return null;
      }
      return parsed.data.debug ?? null;
    } catch (error) {
      process.stderr.write(
        `Failed to load ${configPath}: ${error instanceof Error ? error.message : String(error)}\n`,
      );
      return null;
    }
  }

  // Later entries win: defaults < project < user < env < cli < ephemeral
  private mergeConfigurations(): void {
    const layers = [
      this.projectConfig,
      this.userConfig,
      this.envConfig,
      this.cliConfig,
      this.ephemeralConfig,
    ];

    this.mergedConfig = layers.reduce<DebugSettings>(
      (merged, layer) => (layer ? { ...merged, ...layer } : merged),
      { ...this.defaultConfig },
    );

    this.listeners.forEach((listener) => listener());
  }

  setCliConfig(config: Partial<DebugSettings>): void {
    this.cliConfig = config;
    this.mergeConfigurations();
  }

  setEphemeralConfig(config: Partial<DebugSettings>): void {
    this.ephemeralConfig = {
      ...this.ephemeralConfig,
      ...config,
    };
    this.mergeConfigurations();
  }

  clearEphemeralConfig(): void {
    this.ephemeralConfig = null;
    this.mergeConfigurations();
  }

  getEffectiveConfig(): DebugSettings {
    return this.mergedConfig;
  }

  getOutputTarget(): string {
    const output = this.mergedConfig.output;
    return typeof output === 'string' ? output : output.target;
  }

  getLogFile(): string | undefined {
    const output = this.mergedConfig.output;
    return typeof output === 'string' ? undefined : output.file;
  }

  getRedactPatterns(): string[] {
    return this.mergedConfig.redactPatterns;
  }

  subscribe(listener: () => void): void {
    this.listeners.add(listener);
  }

  unsubscribe(listener: () => void): void {
    this.listeners.delete(listener);
  }

  private parseDebugEnv(value: string): string[] {
    return value
      .split(',')
      .map((s) => s.trim())
      .filter(Boolean);
  }
}
