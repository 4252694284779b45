export { getTools, getToolSpec, getToolSpecs, TOOL_SPECS, type ToolExposureMode, type ToolSpec } from './registry.js';
export { handleToolCall } from './dispatcher.js';
