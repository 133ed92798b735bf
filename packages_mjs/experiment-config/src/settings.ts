import type { FragmentValue } from './domain.js';
import type { ResolvedConfiguration } from './configuration.js';
import { CoreSettingsSchema, SettingsValidationError, formatIssues } from './validators.js';

export interface CoreSettings {
    safePlaceholders: string[];
    extendedHeaderPath?: string;
    extendedTailerPath?: string;
}

/** A job section value wins over the top-level one. */
function jobOrGlobal(config: ResolvedConfiguration, key: string, jobName?: string): FragmentValue | undefined {
    if (jobName) {
        const jobValue = config.get(`JOBS.${jobName}.${key}`);
        if (jobValue !== undefined) return jobValue;
    }
    return config.get(key);
}

/**
 * Settings the core consumes from a resolved configuration.
 */
export function readCoreSettings(config: ResolvedConfiguration, jobName?: string): CoreSettings {
    const parsed = CoreSettingsSchema.safeParse({
        SAFE_PLACEHOLDERS: config.get('SAFE_PLACEHOLDERS'),
        EXTENDED_HEADER_PATH: jobOrGlobal(config, 'EXTENDED_HEADER_PATH', jobName),
        EXTENDED_TAILER_PATH: jobOrGlobal(config, 'EXTENDED_TAILER_PATH', jobName)
    });

    if (!parsed.success) {
        throw new SettingsValidationError(`Invalid core settings: ${formatIssues(parsed.error)}`);
    }

    const settings: CoreSettings = { safePlaceholders: parsed.data.SAFE_PLACEHOLDERS };
    if (parsed.data.EXTENDED_HEADER_PATH !== undefined) settings.extendedHeaderPath = parsed.data.EXTENDED_HEADER_PATH;
    if (parsed.data.EXTENDED_TAILER_PATH !== undefined) settings.extendedTailerPath = parsed.data.EXTENDED_TAILER_PATH;
    return settings;
}
