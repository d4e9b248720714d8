export const TOOL_NAME = 'odx-analyze';
export const VERSION = '0.1.0';
