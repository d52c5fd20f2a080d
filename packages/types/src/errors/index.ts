/**
 * Unified Error Exports
 *
 * Import from this file to access all error-related functionality.
 */

// Base error class
export { BaseError } from "./base.js"
