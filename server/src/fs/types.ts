import type { GitStatus } from "./git_status.js";

// Wire shapes: these travel to clients as-is, hence snake_case.

export type FileEntry = {
  name: string;
  path: string;
  is_directory: boolean;
  is_symlink: boolean;
  is_hidden: boolean;
  size: number;
  modified: number;
  created?: number;
  mime_type?: string;
  permissions: string;
  symlink_target?: string;
  git_status?: GitStatus;
};

export type SortBy = "name" | "size" | "modified" | "type";
export type SortOrder = "asc" | "desc";
export type ContentEncoding = "utf8" | "base64";

export type DirectoryListing = {
  path: string;
  entries: FileEntry[];
  total_count: number;
  truncated: boolean;
};

export type FileContent = {
  path: string;
  content: string;
  encoding: ContentEncoding;
  mime_type: string;
  size: number;
  modified: number;
  truncated_at?: number;
};

export type FileChunk = {
  path: string;
  chunk_index: number;
  total_chunks: number;
  total_size: number;
  data: string;
  checksum: string;
  is_last: boolean;
};

export type ContentMatch = {
  line_number: number;
  line_content: string;
  match_start: number;
  match_end: number;
};

export type SearchMatch = {
  path: string;
  entry: FileEntry;
  content_matches?: ContentMatch[];
};

export type SearchResults = {
  query: string;
  path: string;
  matches: SearchMatch[];
  truncated: boolean;
};

export type WriteResult = {
  path: string;
  bytes: number;
};
