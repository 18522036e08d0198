import path from "path";

/**
 * Templates shipped with the CLI, beside `src/` and the bundled `dist/`
 */
export const DEFAULT_TEMPLATES_DIR = path.resolve(__dirname, "..", "templates");
