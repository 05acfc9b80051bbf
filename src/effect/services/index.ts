/**
 * Services barrel export
 */

export { Host } from "./Host"
export { LayoutStorage } from "./LayoutStorage"
export { LayoutManager } from "./LayoutManager"
export { Keybindings, ACTION_MODIFIERS, DIRECTION_KEYS, SLOT_MODIFIERS } from "./Keybindings"
