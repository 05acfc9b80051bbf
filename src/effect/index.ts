/**
 * Effect module barrel export.
 */

// Types
export * from "./types"

// Errors
export * from "./errors"

// Domain Models
export * from "./models"

// Configuration
export * from "./Config"

// Services
export * from "./services"

// Runtime
export * from "./runtime"

// Host bridge
export * from "./bridge/host-events-bridge"
