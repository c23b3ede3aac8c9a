/**
 * CLI Commands Index
 * Exports all available CLI commands
 */

export { toolsCommand, type ToolsOptions } from './tools.js';
export { doctorCommand, type DoctorOptions } from './doctor.js';
export { runCommand, type RunOptions } from './run.js';
