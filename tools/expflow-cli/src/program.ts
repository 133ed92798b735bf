import { Command, Option } from 'commander';
import { setLogLevel } from '@expflow/experiment-config';
import {
    renderCommand,
    resolveCommand,
    sourceCommand,
    type LoadOptions,
    type RenderCommandOptions,
    type ResolveCommandOptions
} from './commands.js';

function fail(error: unknown): never {
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
}

const LOG_LEVEL_FLAGS = '--log-level <level>';
const LOG_LEVEL_HELP = 'silent, error, warn, info, debug or trace';

function applyLogLevel(command: Command): void {
    const level: unknown = command.opts().logLevel;
    if (typeof level === 'string') {
        setLogLevel(level);
    }
}

/** The `expflow` program; `--log-level` is taken before or after the subcommand. */
export function createProgram(): Command {
    const program = new Command();

    program
        .name('expflow')
        .description('Merge experiment configuration fragments and render job scripts')
        .version('0.1.0')
        .option(LOG_LEVEL_FLAGS, LOG_LEVEL_HELP)
        .hook('preAction', (root, actionCommand) => {
            applyLogLevel(root);
            applyLogLevel(actionCommand);
        });

    program
        .command('resolve')
        .description('Merge every fragment of a configuration directory and print the resolved document')
        .option(LOG_LEVEL_FLAGS, LOG_LEVEL_HELP)
        .argument('<confDir>', 'Directory holding the YAML fragments')
        .option('-o, --output <file>', 'Write the document to a file instead of stdout')
        .addOption(new Option('-f, --format <format>', 'Output format').choices(['yaml', 'json']).default('yaml'))
        .option('-p, --pattern <glob>', 'Fragment file pattern')
        .option('-s, --safe <names...>', 'Placeholder names left untouched')
        .option('--provenance-json <file>', 'Also export the provenance as JSON')
        .action((confDir: string, options: ResolveCommandOptions) => {
            try {
                const document = resolveCommand(confDir, options);
                if (!options.output) {
                    process.stdout.write(document);
                }
            } catch (error) {
                fail(error);
            }
        });

    program
        .command('render')
        .description('Render a job script from a template')
        .option(LOG_LEVEL_FLAGS, LOG_LEVEL_HELP)
        .argument('<template>', 'Template file')
        .requiredOption('-c, --config <confDir>', 'Directory holding the YAML fragments')
        .requiredOption('-j, --job <name>', 'Job identifier, used for the status artifacts')
        .option('-r, --project-root <dir>', 'Base directory for extended header/tailer paths')
        .option('-d, --out-dir <dir>', 'Directory the .cmd file is written to')
        .option('--status-dir <dir>', 'Directory the status artifacts are written to at run time')
        .option('-p, --pattern <glob>', 'Fragment file pattern')
        .option('-s, --safe <names...>', 'Placeholder names left untouched')
        .action((template: string, options: RenderCommandOptions) => {
            try {
                const result = renderCommand(template, options);
                console.log(result.file);
            } catch (error) {
                fail(error);
            }
        });

    program
        .command('source')
        .description('Show which fragment last wrote a key')
        .option(LOG_LEVEL_FLAGS, LOG_LEVEL_HELP)
        .argument('<confDir>', 'Directory holding the YAML fragments')
        .argument('<keyPath>', 'Dotted key path, e.g. JOBS.SIM.WALLCLOCK')
        .option('-p, --pattern <glob>', 'Fragment file pattern')
        .action((confDir: string, keyPath: string, options: LoadOptions) => {
            try {
                console.log(sourceCommand(confDir, keyPath, options));
            } catch (error) {
                fail(error);
            }
        });

    return program;
}
