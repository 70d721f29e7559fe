/**
 * Centralized icon registry.
 *
 * All icon usage in the app should import from this module.
 * To swap the underlying icon library, only this file needs to change.
 */
export { Fan, RotateCcw } from "lucide-react";
