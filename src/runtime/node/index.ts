/**
 * Node.js runtime implementation
 *
 * This module provides the Node.js-specific implementation of the Runtime interface.
 */

import type { Runtime } from "../types.ts";
import { nodeControl } from "./control.ts";
import { nodeErrors } from "./errors.ts";
import { nodeFS } from "./fs.ts";

/**
 * Node.js runtime implementation
 */
export const nodeRuntime: Runtime = {
  fs: nodeFS,
  control: nodeControl,
  errors: nodeErrors,
};
