/** Kept in step with package.json. */
export const EMBUNDLE_VERSION = "0.1.0";
