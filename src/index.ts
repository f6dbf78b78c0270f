// This module is a library entry point
// For CLI usage, run: npx datlpl <input.dat> --input-path <dir>

export * from "./types.js"
export * from "./errors.js"
export * from "./config.js"
export * from "./dat.js"
export * from "./regions.js"
export * from "./storage.js"
export * from "./playlist.js"
export * from "./validate.js"
export * from "./convert.js"
