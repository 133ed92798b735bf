export {
    TRAPPED_SIGNALS,
    SIGNAL_EXIT_BASE,
    STATUS_SUFFIX,
    COMPLETED_SUFFIX,
    CONTRACT_LINES,
    buildHeader,
    buildTailer,
    signalExitCode,
    signalTrapLine,
    statusFileName,
    completedFileName,
    shellQuote,
    verifyExitStatusContract,
    type TrappedSignal,
    type HeaderOptions,
    type TailerOptions
} from './exit-status.js';

export {
    renderScript,
    renderJobScript,
    scriptFileName,
    SCRIPT_EXTENSION,
    type RenderOptions,
    type JobScriptRequest,
    type RenderedScript
} from './renderer.js';

export {
    ScriptRenderError,
    ExtendedScriptNotFoundError,
    SecurityError,
    ExitStatusContractError
} from './errors.js';
