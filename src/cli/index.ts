#!/usr/bin/env node

/**
 * flow-recording CLI
 *
 * Converts recordings between the text and XML formats and summarises
 * their content.
 */

import { Command, Option as CliOption } from 'commander';
import { Effect, Option, pipe } from 'effect';
import { readRecording, renderRecording } from '../lib/recording/recording-io';
import type { RecordingFormat } from '../lib/recording/recording-io';
import { writeTextFile } from '../lib/io/file-writer';
import {
  ConfigService,
  ConfigServiceLive,
  type ConfigOverrides,
} from '../lib/services/config';
import { withConfiguredLogging } from '../lib/utils/logging';

interface ConvertOptions {
  to: string;
  output?: string | undefined;
  comment?: string | undefined;
  verbose: boolean;
}

interface InspectOptions {
  comment?: string | undefined;
  verbose: boolean;
}

const isRecordingFormat = (value: string): value is RecordingFormat =>
  value === 'text' || value === 'xml';

/**
 * Run a command against the environment config with CLI overrides applied.
 * `--verbose` raises the configured log level to debug.
 */
const runCommand = <A, E>(
  effect: Effect.Effect<A, E, ConfigService>,
  overrides: ConfigOverrides,
  verbose: boolean
): Promise<A> =>
  Effect.runPromise(
    pipe(
      Effect.gen(function* () {
        const config = yield* ConfigService;
        yield* config.update(
          verbose ? { ...overrides, logging: { level: 'debug' } } : overrides
        );
        return yield* withConfiguredLogging(effect);
      }),
      Effect.provide(ConfigServiceLive)
    )
  );

const commentOverrides = (comment: string | undefined): ConfigOverrides =>
  comment === undefined ? {} : { recording: { commentIndicator: comment } };

/**
 * Main CLI program
 */
const program = new Command();

program
  .name('flow-recording')
  .description('Convert and inspect object recordings')
  .version('1.0.0');

/**
 * Convert command
 */
program
  .command('convert <input>')
  .description('Convert a recording to text or XML')
  .addOption(
    new CliOption('-t, --to <format>', 'Output format')
      .choices(['text', 'xml'])
      .makeOptionMandatory()
  )
  .option('-o, --output <file>', 'Write to a file instead of stdout')
  .option('-c, --comment <indicator>', 'Skip text lines starting with this')
  .option('-v, --verbose', 'Verbose output', false)
  .action(async (input: string, options: ConvertOptions) => {
    const format = options.to;
    if (!isRecordingFormat(format)) {
      console.error(`❌ Unknown format: ${format}`);
      process.exit(1);
    }

    try {
      const output = await runCommand(
        Effect.gen(function* () {
          const { constructs } = yield* readRecording(input);
          return yield* renderRecording(constructs.values(), format);
        }),
        commentOverrides(options.comment),
        options.verbose
      );

      if (options.output === undefined) {
        process.stdout.write(output);
        return;
      }
      await Effect.runPromise(writeTextFile(options.output, output));
      console.log(`✅ Wrote ${options.output}`);
    } catch (error) {
      console.error('❌ Conversion failed:', error);
      process.exit(1);
    }
  });

/**
 * Inspect command
 */
program
  .command('inspect <input>')
  .description('Summarise the objects in a recording')
  .option('-c, --comment <indicator>', 'Skip text lines starting with this')
  .option('-v, --verbose', 'Verbose output', false)
  .action(async (input: string, options: InspectOptions) => {
    try {
      const result = await runCommand(
        readRecording(input),
        commentOverrides(options.comment),
        options.verbose
      );

      const byInstruction = new Map<string, number>();
      for (const construct of result.constructs.values()) {
        const key = Option.getOrElse(construct.instruction, () => '(none)');
        byInstruction.set(key, (byInstruction.get(key) ?? 0) + 1);
      }

      console.log(`Objects: ${result.constructs.size}`);
      for (const [instruction, count] of byInstruction) {
        console.log(`  ${instruction}: ${count}`);
      }
      console.log(`Dangling links: ${result.danglingLinks.length}`);
      for (const link of result.danglingLinks) {
        console.log(
          `  ${link.constructId} -> ${link.targetId} (${link.names.join(', ')})`
        );
      }
    } catch (error) {
      console.error('❌ Inspection failed:', error);
      process.exit(1);
    }
  });

program.parse(process.argv);
