/**
 * photo-tools command line
 *
 *   photo-tools rename [project]            rename 0_RAW files by capture time
 *   photo-tools export [project]            export 1_EDIT TIFFs into 2_EXPORT
 *   photo-tools cleanup <library>           reclaim disk space across a library
 *   photo-tools rules <file>                validate EXIF override rules
 *
 * Exit codes: 0 success, 1 fatal error, 2 finished with per-file failures.
 */

import { Command, CommanderError, Option } from 'commander';

import { cleanupLibrary } from '../cleanup/index.js';
import { defaultRulesPath } from '../config/index.js';
import { EXPORT_SIZES, processForExport } from '../export/index.js';
import { describeError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { pluralize } from '../lib/summary.js';
import {
  closeExifTool,
  createExifToolStore,
  EXPORT_TAGS,
  type MetadataStore
} from '../metadata/index.js';
import { renameRawFiles } from '../rename/index.js';
import { evaluate, loadRuleSet, referencedTags } from '../rules/index.js';
import type { BatchSummary } from '../types/index.js';

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_PARTIAL = 2;

export interface CliDependencies {
  store?: MetadataStore;
  cwd?: () => string;
  print?: (line: string) => void;
  printError?: (line: string) => void;
}

export interface CliState {
  exitCode: number;
}

function exitCodeOf(summary: BatchSummary): number {
  return summary.failed > 0 ? EXIT_PARTIAL : EXIT_OK;
}

function summaryLine(summary: BatchSummary, verb: string): string {
  const parts = [`${summary.done} ${verb}`];
  if (summary.unchanged > 0) {
    parts.push(`${summary.unchanged} unchanged`);
  }
  parts.push(`${summary.skipped} skipped`, `${summary.failed} failed`);
  const total = summary.outcomes.length;
  return `Done (${total} ${pluralize('file', total)}): ${parts.join(', ')}`;
}

export function createProgram(
  deps: CliDependencies = {},
  state: CliState = { exitCode: EXIT_OK }
): Command {
  const cwd = deps.cwd ?? (() => process.cwd());
  const print = deps.print ?? ((line: string) => console.log(line));
  const store = (): MetadataStore => deps.store ?? createExifToolStore();

  const program = new Command()
    .name('photo-tools')
    .description('Photo library maintenance: renaming, exporting and cleanup')
    .exitOverride();

  program
    .command('rename')
    .description('Rename 0_RAW files to YYYYMMDD_hhmm_nnnn.<ext> using their capture time')
    .argument('[project]', 'project directory (defaults to the current directory)')
    .option('--dry-run', 'print the new names without renaming anything', false)
    .action(async (project: string | undefined, options: { dryRun: boolean }) => {
      const summary = await renameRawFiles(project ?? cwd(), {
        dryRun: options.dryRun,
        store: store()
      });
      for (const outcome of summary.outcomes) {
        if (outcome.status === 'done') {
          print(`${outcome.file} -> ${outcome.target}`);
        } else if (outcome.status === 'skipped' || outcome.status === 'failed') {
          print(`${outcome.file}: ${outcome.status}, ${outcome.reason}`);
        }
      }
      print(summaryLine(summary, options.dryRun ? 'to rename' : 'renamed'));
      state.exitCode = exitCodeOf(summary);
    });

  program
    .command('export')
    .description('Convert 1_EDIT TIFFs into bordered JPEGs in 2_EXPORT with EXIF from the originals')
    .argument('[project]', 'project directory (defaults to the current directory)')
    .addOption(
      new Option('--size <size>', 'exported image size').choices(EXPORT_SIZES).default('large')
    )
    .option('--no-border', 'do not add a border')
    .option('--exif <path>', 'EXIF override rules file')
    .option('--dry-run', 'print the exports without writing anything', false)
    .action(
      async (
        project: string | undefined,
        options: { size: string; border: boolean; exif?: string; dryRun: boolean }
      ) => {
        const summary = await processForExport(project ?? cwd(), {
          size: options.size,
          border: options.border,
          rulesPath: options.exif ?? defaultRulesPath(),
          dryRun: options.dryRun,
          store: store()
        });
        for (const outcome of summary.outcomes) {
          if (outcome.status === 'done') {
            print(`${outcome.file} -> ${outcome.target}`);
          } else if (outcome.status === 'skipped' || outcome.status === 'failed') {
            print(`${outcome.file}: ${outcome.status}, ${outcome.reason}`);
          }
        }
        print(summaryLine(summary, options.dryRun ? 'to export' : 'exported'));
        state.exitCode = exitCodeOf(summary);
      }
    );

  program
    .command('cleanup')
    .description('Remove temporary files and hard-link RAW selects across a library')
    .argument('<library>', 'photo library directory')
    .option('--no-remove-dotfiles', 'keep ._* files')
    .option('--no-remove-edits', 'keep files in 1_EDIT')
    .option('--no-hardlink-selects', 'keep RAW selects as separate copies')
    .option('--dry-run', 'print the actions without changing anything', false)
    .action(
      async (
        library: string,
        options: {
          removeDotfiles: boolean;
          removeEdits: boolean;
          hardlinkSelects: boolean;
          dryRun: boolean;
        }
      ) => {
        const report = await cleanupLibrary(library, {
          removeDotFiles: options.removeDotfiles,
          removeEdits: options.removeEdits,
          hardlinkSelects: options.hardlinkSelects,
          dryRun: options.dryRun
        });
        for (const project of report.projects) {
          const count = project.actions.length;
          print(`Cleaning "${project.projectDir}": ${count} ${pluralize('action', count)}`);
        }
        const { totals } = report;
        print(
          `Removed ${totals.filesRemoved} ${pluralize('file', totals.filesRemoved)}, ` +
            `linked ${totals.linksCreated} ${pluralize('select', totals.linksCreated)}, ` +
            `${totals.mismatches} ${pluralize('mismatch', totals.mismatches, 'mismatches')}` +
            (report.dryRun ? ' (dry run)' : '')
        );
        state.exitCode = totals.errors > 0 ? EXIT_PARTIAL : EXIT_OK;
      }
    );

  program
    .command('rules')
    .description('Validate an EXIF override rules file')
    .argument('<file>', 'rules file')
    .option('--preview <photo>', 'print the tag mutations the rules produce for a photo')
    .action(async (file: string, options: { preview?: string }) => {
      const ruleSet = await loadRuleSet(file);
      print(`${file}: ${ruleSet.length} ${pluralize('rule', ruleSet.length)} OK`);
      if (options.preview) {
        const names = [...new Set<string>([...EXPORT_TAGS, ...referencedTags(ruleSet)])];
        const metadata = await store().read(options.preview, names);
        const mutations = evaluate(metadata, ruleSet);
        if (mutations.length === 0) {
          print('No rule matches');
        }
        for (const tag of mutations) {
          print(`set ${tag.name} ${tag.valueType} ${tag.value}`);
        }
      }
      state.exitCode = EXIT_OK;
    });

  return program;
}

/**
 * Run the CLI and resolve with the process exit code.
 */
export async function runCli(
  argv: readonly string[],
  deps: CliDependencies = {}
): Promise<number> {
  const printError = deps.printError ?? ((line: string) => console.error(line));
  const state: CliState = { exitCode: EXIT_OK };
  const program = createProgram(deps, state);

  try {
    await program.parseAsync([...argv]);
    return state.exitCode;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    logger.debug({ error }, 'Command failed');
    printError(`Error: ${describeError(error)}`);
    return EXIT_FATAL;
  } finally {
    await closeExifTool();
  }
}
