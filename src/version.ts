import * as packageJson from "../package.json";

export const PTRGUARD_VERSION = packageJson.version;
