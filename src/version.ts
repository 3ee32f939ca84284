// Using import would require resolveJsonModule, which pulls package.json
// into the build output.
const pkg: { name: string; version: string } = require("../package.json");

export const SDK_VERSION: string = pkg.version;
