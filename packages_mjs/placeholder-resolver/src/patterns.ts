export const PATTERNS = {
    // %%, %KEY% or %^KEY%, in one alternation so a scan never splits an escape
    TOKEN: /%%|%(\^?)([A-Za-z_][\w.-]*)%/g,

    DEFERRED_MARKER: '^',
};
