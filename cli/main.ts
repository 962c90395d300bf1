#!/usr/bin/env node
import { config } from 'dotenv';
import { resolve } from 'path';
import { FileLineSource, LineSource } from '../shared/csv';
import { InputFileError, OutputFileError, HeaderMismatchError } from '../shared/errors';
import { MotionSynthesisCoordinator } from '../motionProcessing/MotionSynthesisCoordinator';
import { CSVExporter } from '../motionProcessing/recording';
import { createSynthesisConfig, loadEnvironmentConfig } from '../motionProcessing/shared/config';
import { ENV_FILE } from '../motionProcessing/shared/constants';
import { PerformanceLogger } from '../motionProcessing/shared/PerformanceLogger';
import { SynthesisConfig } from '../motionProcessing/shared/types';

export enum EXIT_CODE {
  SUCCESS = 0,
  STARTUP_FAILURE = 1,
  PIPELINE_FAILURE = 2,
}

const LOG_CATEGORY = 'CLI';

export const USAGE = 'Usage: pose-interp <tracker data csv> <time reference data csv>';

function printUsage(): void {
  console.error(USAGE);
}

/**
 * Load `.env.local` from `cwd` underneath `env`; variables already set win.
 */
function loadEnvFile(env: NodeJS.ProcessEnv, cwd: string): NodeJS.ProcessEnv {
  const fromFile: Record<string, string> = {};
  config({ path: resolve(cwd, ENV_FILE), processEnv: fromFile });
  return { ...fromFile, ...env };
}

function isStartupError(error: unknown): boolean {
  return error instanceof InputFileError || error instanceof OutputFileError || error instanceof HeaderMismatchError;
}

/**
 * Interpolate tracker poses at every reference timestamp and write the merged CSV.
 * Returns the process exit code.
 */
export function runCli(args: readonly string[], env: NodeJS.ProcessEnv, cwd: string = process.cwd()): EXIT_CODE {
  if (args.length !== 2) {
    printUsage();
    return EXIT_CODE.STARTUP_FAILURE;
  }

  let synthesisConfig: SynthesisConfig;
  try {
    synthesisConfig = createSynthesisConfig(loadEnvironmentConfig(loadEnvFile(env, cwd)));
  } catch (error) {
    PerformanceLogger.error(LOG_CATEGORY, error instanceof Error ? error.message : String(error));
    return EXIT_CODE.STARTUP_FAILURE;
  }
  PerformanceLogger.configure(synthesisConfig.logging);

  const [trackerPath, timestampPath] = args;
  const outputPath = resolve(cwd, CSVExporter.expandHomePath(synthesisConfig.outputPath));
  const sources: LineSource[] = [];

  try {
    const tracker = new FileLineSource(resolve(cwd, trackerPath));
    sources.push(tracker);
    const timestamps = new FileLineSource(resolve(cwd, timestampPath));
    sources.push(timestamps);

    const stats = new MotionSynthesisCoordinator(synthesisConfig).run({
      tracker,
      timestamps,
      openOutput: () => CSVExporter.toFile(outputPath, synthesisConfig.outputPrefixHeaders, synthesisConfig.csv)
    });
    PerformanceLogger.info(LOG_CATEGORY, `Rows: ${stats.rowsWritten} written to ${outputPath}`);
    return EXIT_CODE.SUCCESS;
  } catch (error) {
    if (isStartupError(error)) {
      PerformanceLogger.error(LOG_CATEGORY, error instanceof Error ? error.message : String(error));
      printUsage();
      return EXIT_CODE.STARTUP_FAILURE;
    }
    PerformanceLogger.error(LOG_CATEGORY, 'Got exception', error);
    return EXIT_CODE.PIPELINE_FAILURE;
  } finally {
    for (const source of sources) {
      source.close();
    }
  }
}

if (require.main === module) {
  process.exitCode = runCli(process.argv.slice(2), process.env);
}
