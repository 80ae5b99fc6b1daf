import type { LocalTool } from './local-tool.js';
import { calculatorTool } from './calculator.js';
import { assistantHelperTool } from './assistant-helper.js';
import { currentTimeTool } from './current-time.js';

export { defineLocalTool, toParameterSchema, type LocalTool } from './local-tool.js';
export { calculatorTool, assistantHelperTool, currentTimeTool };

/** Tools every session starts with, before the remote catalog is merged in */
export const LOCAL_TOOLS: readonly LocalTool[] = Object.freeze([
    assistantHelperTool,
    calculatorTool,
    currentTimeTool,
]);
