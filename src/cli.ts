#!/usr/bin/env node
/**
 * Command-line entry point
 *
 *   resume-tailor <resume-file> <job-description-file> [--output path] [--json]
 */

import { parseArgs } from 'util';
import { createLLMClientFromConfig, ConfigurationError } from './backend/config';
import { FileExtractor } from './main/fileExtractor';
import { resumeParser } from './main/resumeParser';
import { documentRenderer, renderText } from './main/documentRenderer';
import { TailoringPipeline } from './tailor/pipeline';
import { PipelineError, PipelineErrorFactory } from './tailor/errors/types';
import { loggers, serializeError } from './shared/logging/logger';
import type { DocumentRenderer, TextGenerator } from './tailor/types';

export const USAGE =
  'Usage: resume-tailor <resume-file> <job-description-file> [--output path] [--json]';

export interface CliOptions {
  resumePath: string;
  jobPath: string;
  output?: string;
  json: boolean;
}

export interface CliDependencies {
  /** Defaults to the LLM client configured by the environment */
  generator?: TextGenerator;
  renderer?: DocumentRenderer;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
}

/**
 * Parse command-line arguments. Returns null when they are unusable.
 */
export function parseCliArgs(argv: readonly string[]): CliOptions | null {
  try {
    const { values, positionals } = parseArgs({
      args: [...argv],
      allowPositionals: true,
      options: {
        output: { type: 'string', short: 'o' },
        json: { type: 'boolean', default: false }
      }
    });

    const [resumePath, jobPath, ...rest] = positionals;
    if (!resumePath || !jobPath || rest.length > 0) {
      return null;
    }

    return {
      resumePath,
      jobPath,
      output: values.output,
      json: values.json ?? false
    };
  } catch (error) {
    loggers.cli.debug({ err: serializeError(error) }, 'Invalid arguments');
    return null;
  }
}

/**
 * Run the CLI and return its exit code
 */
export async function runCli(argv: readonly string[], deps: CliDependencies = {}): Promise<number> {
  const stdout = deps.stdout ?? ((text: string) => process.stdout.write(text));
  const stderr = deps.stderr ?? ((text: string) => process.stderr.write(text));

  const options = parseCliArgs(argv);
  if (!options) {
    stderr(`${USAGE}\n`);
    return 2;
  }

  try {
    const extractor = new FileExtractor();
    const jobDescription = await extractor.extract(options.jobPath, 'job description');
    if (!jobDescription.trim()) {
      throw PipelineErrorFactory.emptyJobDescription();
    }

    const pipeline = new TailoringPipeline({
      generator: deps.generator ?? createLLMClientFromConfig(),
      parser: resumeParser,
      extractor
    });
    const result = await pipeline.runFromFile(options.resumePath, jobDescription);

    if (options.output) {
      const written = await (deps.renderer ?? documentRenderer).render(result.sections, options.output);
      stderr(`Tailored resume written to ${written}\n`);
    }

    if (options.json) {
      stdout(`${JSON.stringify({
        sections: result.sections,
        keywords: result.keywords,
        verification: result.verification,
        path: result.path,
        escalated: result.escalated
      }, null, 2)}\n`);
    } else if (!options.output) {
      stdout(renderText(result.sections));
    }
    return 0;
  } catch (error) {
    if (error instanceof PipelineError) {
      stderr(`Error [${error.code}]: ${error.userMessage}\n${error.technicalDetails}\n`);
      return 1;
    }
    if (error instanceof ConfigurationError) {
      stderr(`${error.message}\n`);
      return 1;
    }
    throw error;
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      loggers.cli.error({ err: serializeError(error) }, 'Unexpected failure');
      process.exitCode = 1;
    });
}
