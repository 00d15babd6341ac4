/** Package version reported by the CLI and adapters */
export const VERSION = '0.1.0';
