export { PATTERNS } from './patterns.js';

export {
    extractPlaceholders,
    hasPlaceholders,
    type Placeholder,
    type PlaceholderKind
} from './extractor.js';

export {
    substitute,
    type Lookup,
    type SubstituteOptions,
    type SubstitutionResult,
    type UnresolvedToken
} from './resolver.js';

export { coerceToString } from './coercion.js';
