import * as fs from 'fs';
import * as path from 'path';
import {
    ExpConfigError,
    MergeEngine,
    exportProvenance,
    getLogger,
    loadFragmentDirectory,
    serializeConfiguration,
    type DocumentFormat,
    type MergeResult
} from '@expflow/experiment-config';
import { renderJobScript, scriptFileName, verifyExitStatusContract } from '@expflow/job-script-renderer';

const logger = getLogger('cli');

export interface LoadOptions {
    pattern?: string;
    safe?: string[];
}

export interface ResolveCommandOptions extends LoadOptions {
    output?: string;
    format?: DocumentFormat;
    provenanceJson?: string;
}

export interface RenderCommandOptions extends LoadOptions {
    config: string;
    job: string;
    projectRoot?: string;
    outDir?: string;
    statusDir?: string;
}

export interface RenderCommandResult {
    file: string;
    text: string;
}

function loadAndMerge(confDir: string, options: LoadOptions): MergeResult {
    const fragments = loadFragmentDirectory(confDir, options.pattern);
    return new MergeEngine({ safePlaceholders: options.safe ?? [] }).merge(fragments);
}

/** Merge a configuration directory; returns the serialized document. */
export function resolveCommand(confDir: string, options: ResolveCommandOptions = {}): string {
    const { configuration } = loadAndMerge(confDir, options);
    const document = serializeConfiguration(configuration, { format: options.format ?? 'yaml' });

    if (options.output) {
        fs.writeFileSync(options.output, document, 'utf8');
        logger.info(`Resolved configuration written to ${options.output}`);
    }
    if (options.provenanceJson) {
        exportProvenance(configuration, options.provenanceJson);
    }
    return document;
}

/** Render one template into `<outDir>/<name>.cmd`. */
export function renderCommand(templatePath: string, options: RenderCommandOptions): RenderCommandResult {
    const { configuration } = loadAndMerge(options.config, options);
    const templateBody = fs.readFileSync(templatePath, 'utf8');

    const rendered = renderJobScript({
        jobName: options.job,
        templateBody,
        config: configuration,
        projectRoot: options.projectRoot,
        statusDir: options.statusDir,
        safePlaceholders: options.safe
    });
    verifyExitStatusContract(rendered.text);

    const outDir = options.outDir ?? process.cwd();
    fs.mkdirSync(outDir, { recursive: true });
    const file = path.join(outDir, scriptFileName(templatePath));
    fs.writeFileSync(file, rendered.text, { encoding: 'utf8', mode: 0o755 });
    logger.info(`Script for ${options.job} written to ${file}`);

    return { file, text: rendered.text };
}

/** One line naming the fragment that last wrote `keyPath`. */
export function sourceCommand(confDir: string, keyPath: string, options: LoadOptions = {}): string {
    const { configuration } = loadAndMerge(confDir, options);
    const entry = configuration.getParameterSource(keyPath);
    if (!entry) {
        throw new ExpConfigError(`Key '${keyPath}' is not defined in ${path.resolve(confDir)}`);
    }

    const location = entry.line !== undefined ? `${entry.source}:${entry.line}:${entry.col ?? 1}` : entry.source;
    return `${keyPath}: ${location} (${entry.kind})`;
}
