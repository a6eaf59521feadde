/**
 * Version information
 */
export const VERSION = "0.1.0";

export const PROGRAM_NAME = "plaindav";
