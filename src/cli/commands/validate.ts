// Validate command - run the preflight checks and print the report

import { Command } from 'commander';
import { LogLevel, Logger, parseLogLevel } from '../../core/logger.js';
import { ConfigService } from '../../services/config/config-service.js';
import { HostEnvironment, createNodeEnvironment } from '../../services/environment/host-environment.js';
import { PreflightOrchestrator, exitCodeFor } from '../../services/orchestrator/preflight-orchestrator.js';
import { ModuleProbeRuntimeLoader, ProbeRuntimeLoader } from '../../services/probe/runtime-loader.js';
import { handleError } from '../utils/error-handler.js';
import { renderReport } from '../utils/report-renderer.js';

export interface ValidationOptions {
  cwd: string;
  /** Receives each report line */
  write: (line: string) => void;
  /** Takes precedence over log.level in the config file */
  logLevel?: string;
  env?: HostEnvironment;
  loader?: ProbeRuntimeLoader;
}

/**
 * Run one preflight and return the process exit code
 */
export async function runValidation(options: ValidationOptions): Promise<number> {
  const settings = await new ConfigService({ cwd: options.cwd }).getSettings();
  Logger.configure({
    level: parseLogLevel(options.logLevel) ?? parseLogLevel(settings.logLevel) ?? LogLevel.WARN
  });

  const orchestrator = new PreflightOrchestrator({
    env: options.env ?? createNodeEnvironment(options.cwd),
    loader: options.loader ?? new ModuleProbeRuntimeLoader({ cwd: options.cwd }),
    settings
  });

  const report = await orchestrator.run();
  for (const line of renderReport(report)) {
    options.write(line);
  }
  return exitCodeFor(report);
}

export const validateCommand = new Command('validate')
  .description('Check whether this host can build and run the probe agent')
  .action(async () => {
    try {
      process.exitCode = await runValidation({
        cwd: process.cwd(),
        write: line => console.log(line), // eslint-disable-line no-console
        logLevel: process.env.PREFLIGHT_LOG_LEVEL
      });
    } catch (error) {
      handleError(error);
    }
  });
