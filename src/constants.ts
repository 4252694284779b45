export const SERVER_NAME = 'endf-mcp' as const;
export const SERVER_VERSION = '0.1.0' as const;

export const ENDF_INFO = 'endf_info' as const;
export const ENDF_READ_HEADER = 'endf_read_header' as const;
export const ENDF_LIST_DIRECTORY = 'endf_list_directory' as const;
export const ENDF_GET_REACTION = 'endf_get_reaction' as const;
export const ENDF_GET_TABULATED = 'endf_get_tabulated' as const;
export const ENDF_SCAN_FILES = 'endf_scan_files' as const;

export type EndfToolName =
  | typeof ENDF_INFO
  | typeof ENDF_READ_HEADER
  | typeof ENDF_LIST_DIRECTORY
  | typeof ENDF_GET_REACTION
  | typeof ENDF_GET_TABULATED
  | typeof ENDF_SCAN_FILES;
