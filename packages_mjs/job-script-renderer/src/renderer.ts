import * as fs from 'fs';
import * as path from 'path';
import { substitute } from '@expflow/placeholder-resolver';
import {
    type ResolvedConfiguration,
    UnresolvedPlaceholderError,
    getLogger,
    readCoreSettings
} from '@expflow/experiment-config';
import { buildHeader, buildTailer } from './exit-status.js';
import { ExtendedScriptNotFoundError, SecurityError } from './errors.js';

const logger = getLogger('renderer');

export const SCRIPT_EXTENSION = '.cmd';

export interface RenderOptions {
    header: string;
    tailer: string;
    /** Names left verbatim in the body, on top of the configuration's own safe set. */
    safePlaceholders?: Iterable<string>;
    /** Used in error messages. */
    templateName?: string;
}

export interface JobScriptRequest {
    jobName: string;
    templateBody: string;
    config: ResolvedConfiguration;
    /** Base for EXTENDED_HEADER_PATH / EXTENDED_TAILER_PATH. */
    projectRoot?: string;
    statusDir?: string;
    safePlaceholders?: Iterable<string>;
}

export interface RenderedScript {
    jobName: string;
    text: string;
}

function ensureNewline(text: string): string {
    return text === '' || text.endsWith('\n') ? text : `${text}\n`;
}

/**
 * Header, substituted body, tailer. Both placeholder forms resolve against
 * the final configuration, `%%` becomes `%`, and nothing is written. Names
 * the merge treated as safe stay verbatim here as well.
 */
export function renderScript(templateBody: string, config: ResolvedConfiguration, options: RenderOptions): string {
    const safe = new Set<string>([...config.safePlaceholders, ...(options.safePlaceholders ?? [])]);
    const result = substitute(templateBody, key => config.lookup(key), {
        kinds: ['immediate', 'deferred'],
        safe,
        unescape: true
    });

    if (result.unresolved.length > 0) {
        const name = options.templateName ?? '<template>';
        throw new UnresolvedPlaceholderError(
            result.unresolved.map(token => ({ key: token.key, kind: token.kind, context: { scope: 'template', name } }))
        );
    }

    return ensureNewline(options.header) + ensureNewline(result.text) + options.tailer;
}

function readExtension(projectRoot: string, relative: string, part: 'header' | 'tailer'): string {
    const root = path.resolve(projectRoot);
    const target = path.resolve(root, relative);
    const fromRoot = path.relative(root, target);
    if (fromRoot === '..' || fromRoot.startsWith(`..${path.sep}`) || path.isAbsolute(fromRoot)) {
        throw new SecurityError(`Extended ${part} '${relative}' resolves outside the project root ${root}`);
    }
    if (!fs.existsSync(target) || !fs.statSync(target).isFile()) {
        throw new ExtendedScriptNotFoundError(target, part);
    }
    return fs.readFileSync(target, 'utf8');
}

/**
 * Render one job: default header (plus EXTENDED_HEADER_PATH), body, default
 * tailer (with EXTENDED_TAILER_PATH run before completion).
 */
export function renderJobScript(request: JobScriptRequest): RenderedScript {
    const settings = readCoreSettings(request.config, request.jobName);
    const projectRoot = request.projectRoot ?? process.cwd();

    const extendedHeader = settings.extendedHeaderPath
        ? readExtension(projectRoot, settings.extendedHeaderPath, 'header')
        : undefined;
    const extendedTailer = settings.extendedTailerPath
        ? readExtension(projectRoot, settings.extendedTailerPath, 'tailer')
        : undefined;

    const text = renderScript(request.templateBody, request.config, {
        header: buildHeader({ jobName: request.jobName, statusDir: request.statusDir, extendedHeader }),
        tailer: buildTailer({ extendedTailer }),
        safePlaceholders: [...settings.safePlaceholders, ...(request.safePlaceholders ?? [])],
        templateName: request.jobName
    });

    logger.debug(`Rendered script for ${request.jobName} (${text.length} bytes)`);
    return { jobName: request.jobName, text };
}

/** `sim.sh` → `sim.cmd`; a name without extension gets `.cmd` appended. */
export function scriptFileName(templateFile: string): string {
    const base = path.basename(templateFile);
    const ext = path.extname(base);
    return `${ext ? base.slice(0, -ext.length) : base}${SCRIPT_EXTENSION}`;
}
