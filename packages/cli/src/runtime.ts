import fs from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import type { Command } from 'commander';
import {
  ConfigLoader,
  JUDGE_TYPES,
  LLMJudge,
  ProviderRegistry,
  isJudgeType,
  type ConfigFlags,
  type JudgeType,
} from '@evalkit/core';
import {
  ConsoleLogger,
  JsonlLogger,
  NoopLogger,
  UsageError,
  type Config,
  type Logger,
} from '@evalkit/shared';
import { OutputRenderer } from './output/renderer';

export interface GlobalOptions {
  json?: boolean;
  config?: string;
  verbose?: boolean;
}

export interface CliRuntime {
  config: Config;
  logger: Logger;
  registry: ProviderRegistry;
  renderer: OutputRenderer;
  runId: string;
}

export function createLogger(config: Config, json: boolean): Logger {
  if (config.logging.jsonlPath) {
    return new JsonlLogger(path.resolve(config.logging.jsonlPath));
  }
  // stdout carries the JSON document in --json mode
  if (json) {
    return new NoopLogger();
  }
  return new ConsoleLogger({ verbose: config.logging.verbose });
}

/**
 * Loads configuration for a command invocation and wires the logger, renderer and
 * provider registry from it.
 */
export function createRuntime(program: Command, flags: ConfigFlags = {}): CliRuntime {
  const options = program.opts<GlobalOptions>();
  const config = ConfigLoader.load({
    configPath: options.config,
    flags: { ...flags, logging: { ...flags.logging, verbose: options.verbose || undefined } },
  });
  const runId = randomUUID();

  return {
    config,
    logger: createLogger(config, !!options.json),
    registry: ProviderRegistry.withDefaults(config),
    renderer: new OutputRenderer(!!options.json),
    runId,
  };
}

export function createJudge(runtime: CliRuntime): LLMJudge {
  return new LLMJudge(runtime.registry.getAdapter(runtime.config.judge.provider), {
    logger: runtime.logger,
    temperature: runtime.config.judge.temperature,
    runId: runtime.runId,
  });
}

/** Reads `@path` arguments from disk; anything else is taken literally. */
export function readTextArgument(value: string): string {
  if (!value.startsWith('@')) {
    return value;
  }
  const filePath = value.slice(1);
  if (!fs.existsSync(filePath)) {
    throw new UsageError(`File not found: ${filePath}`);
  }
  return fs.readFileSync(filePath, 'utf8');
}

export async function readStdin(stream: NodeJS.ReadableStream = process.stdin): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf8');
}

export function parseNumberOption(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new UsageError(`${flag} must be a number, got '${value}'`);
  }
  return parsed;
}

export function parseJudgeType(value: string | undefined): JudgeType | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isJudgeType(value)) {
    throw new UsageError(`Unknown judge type '${value}'. Expected one of: ${JUDGE_TYPES.join(', ')}`);
  }
  return value;
}
