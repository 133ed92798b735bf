export class ScriptRenderError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ScriptRenderError';
    }
}

export class ExtendedScriptNotFoundError extends ScriptRenderError {
    constructor(
        public readonly path: string,
        public readonly part: 'header' | 'tailer'
    ) {
        super(`Extended ${part} not found: ${path}`);
        this.name = 'ExtendedScriptNotFoundError';
    }
}

export class SecurityError extends ScriptRenderError {
    constructor(message: string) {
        super(message);
        this.name = 'SecurityError';
    }
}

export class ExitStatusContractError extends ScriptRenderError {
    constructor(public readonly missing: string[]) {
        super(`Script does not honour the exit-status contract; missing: ${missing.join(' | ')}`);
        this.name = 'ExitStatusContractError';
    }
}
