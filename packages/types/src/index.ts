export * from "./errors/index.js"
export * from "./guards.js"
export * from "./options.js"
export * from "./patches.js"
export * from "./rules.js"
