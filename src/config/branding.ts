// ─── Root Brand Primitives ──────────────────────────────────────────

/** This tool's name (CLI command, settings filename). */
export const APP_NAME = 'devcontainer-sync';

export const APP_VERSION = '0.1.0';

// ─── Derived Values ─────────────────────────────────────────────────

/** Settings filename, looked up at the repository root: .devcontainer-sync.yaml */
export const SETTINGS_FILENAME = `.${APP_NAME}.yaml`;
