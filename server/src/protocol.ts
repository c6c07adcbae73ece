import { z } from "zod";
import type { SessionSummary } from "./sessions/session_table.js";
import type { FsErrorDetail } from "./fs/errors.js";
import type {
  DirectoryListing,
  FileChunk,
  FileContent,
  FileEntry,
  SearchResults,
} from "./fs/types.js";
import type { ChangeKind } from "./fs/watcher.js";
import type { CliType, WaitType } from "./detect/grammars.js";

export const PROTOCOL_VERSION = "1";

const requestId = z.string().min(1).max(200);
const sessionId = z.string().min(1).max(200);
const fsPath = z.string().max(8192);
const dim = z.number().int().min(0).max(10_000);

export const ClientMessageSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("hello"), auth_token: z.string().optional(), client_version: z.string().default("") }),
  z.object({ type: z.literal("ping") }),
  z.object({ type: z.literal("get_sessions") }),
  z.object({ type: z.literal("subscribe"), session_id: sessionId }),
  z.object({ type: z.literal("unsubscribe"), session_id: sessionId }),
  z.object({
    type: z.literal("send_input"),
    session_id: sessionId,
    text: z.string(),
    raw: z.boolean().default(false),
    client_msg_id: z.string().optional(),
  }),
  z.object({ type: z.literal("pty_resize"), session_id: sessionId, cols: dim, rows: dim }),
  // `new_name` is the older spelling; one of the two must be present.
  z.object({
    type: z.literal("rename_session"),
    session_id: sessionId,
    name: z.string().min(1).max(200).optional(),
    new_name: z.string().min(1).max(200).optional(),
  }),
  z.object({ type: z.literal("get_session_history"), session_id: sessionId, max_bytes: z.number().int().min(0).optional() }),
  z.object({ type: z.literal("tool_approval"), session_id: sessionId, response: z.enum(["yes", "yes_always", "no"]) }),
  z.object({
    type: z.literal("spawn_session"),
    command: z.string().min(1).max(4096),
    args: z.array(z.string().max(4096)).max(256).default([]),
    name: z.string().max(200).optional(),
    working_dir: z.string().max(8192).optional(),
    cols: dim.optional(),
    rows: dim.optional(),
  }),
  z.object({
    type: z.literal("register_push_token"),
    token: z.string().min(1).max(4096),
    token_type: z.string().min(1).max(32),
    platform: z.string().min(1).max(32),
  }),
  z.object({ type: z.literal("unregister_push_token"), token: z.string().min(1).max(4096) }),
  z.object({
    type: z.literal("list_directory"),
    request_id: requestId,
    path: fsPath,
    include_hidden: z.boolean().default(false),
    sort_by: z.enum(["name", "size", "modified", "type"]).default("name"),
    sort_order: z.enum(["asc", "desc"]).default("asc"),
  }),
  z.object({
    type: z.literal("read_file"),
    request_id: requestId,
    path: fsPath,
    offset: z.number().int().min(0).optional(),
    length: z.number().int().min(0).optional(),
    encoding: z.enum(["utf8", "base64"]).default("utf8"),
  }),
  z.object({
    type: z.literal("read_file_chunk"),
    request_id: requestId,
    path: fsPath,
    chunk_index: z.number().int().min(0),
    chunk_size: z.number().int().min(1).optional(),
  }),
  z.object({
    type: z.literal("write_file"),
    request_id: requestId,
    path: fsPath,
    content: z.string(),
    encoding: z.enum(["utf8", "base64"]).default("utf8"),
    create_parents: z.boolean().default(false),
  }),
  z.object({ type: z.literal("create_directory"), request_id: requestId, path: fsPath, recursive: z.boolean().default(false) }),
  z.object({ type: z.literal("delete_path"), request_id: requestId, path: fsPath, recursive: z.boolean().default(false) }),
  z.object({ type: z.literal("rename_path"), request_id: requestId, old_path: fsPath, new_path: fsPath }),
  z.object({
    type: z.literal("copy_path"),
    request_id: requestId,
    source: fsPath,
    destination: fsPath,
    recursive: z.boolean().default(false),
  }),
  z.object({ type: z.literal("get_file_info"), request_id: requestId, path: fsPath }),
  z.object({
    type: z.literal("search_files"),
    request_id: requestId,
    path: fsPath,
    pattern: z.string().max(1024),
    content_pattern: z.string().max(1024).optional(),
    max_depth: z.number().int().min(1).optional(),
    max_results: z.number().int().min(1).optional(),
  }),
  z.object({ type: z.literal("watch_directory"), request_id: requestId, path: fsPath }),
  z.object({ type: z.literal("unwatch_directory"), request_id: requestId, path: fsPath }),
  z.object({ type: z.literal("get_home_directory"), request_id: requestId }),
  z.object({ type: z.literal("get_allowed_roots"), request_id: requestId }),
  z.object({
    type: z.literal("upload_file"),
    request_id: requestId,
    session_id: sessionId,
    file_name: z.string().max(4096),
    content_base64: z.string(),
    mime_type: z.string().max(200).optional(),
  }),
]);

export type ClientMessage = z.infer<typeof ClientMessageSchema>;
export type ClientMessageType = ClientMessage["type"];

export const FS_REQUEST_TYPES = [
  "list_directory",
  "read_file",
  "read_file_chunk",
  "write_file",
  "create_directory",
  "delete_path",
  "rename_path",
  "copy_path",
  "get_file_info",
  "search_files",
  "watch_directory",
  "unwatch_directory",
  "get_home_directory",
  "get_allowed_roots",
  "upload_file",
] as const satisfies readonly ClientMessageType[];

export type FsRequestType = (typeof FS_REQUEST_TYPES)[number];
export type FsRequest = Extract<ClientMessage, { type: FsRequestType }>;

const FS_TYPES: ReadonlySet<string> = new Set(FS_REQUEST_TYPES);

export function isFsRequest(msg: ClientMessage): msg is FsRequest {
  return FS_TYPES.has(msg.type);
}

export const WrapperMessageSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("register_pty"),
    session_id: sessionId,
    name: z.string().max(200).default(""),
    command: z.string().max(4096),
    project_path: z.string().max(8192),
    cols: dim.optional(),
    rows: dim.optional(),
    auth_token: z.string().optional(),
  }),
  z.object({ type: z.literal("pty_output"), data: z.string() }),
  z.object({ type: z.literal("session_ended"), exit_code: z.number().int().nullable().default(null) }),
  z.object({ type: z.literal("ping") }),
]);

export type WrapperMessage = z.infer<typeof WrapperMessageSchema>;

export type ErrorCode =
  | "hello_required"
  | "unauthorized"
  | "invalid_message"
  | "corrupt_stream"
  | "rate_limited"
  | "session_not_found"
  | "session_exists"
  | "session_ended"
  | "not_subscribed"
  | "not_waiting"
  | "output_lagged"
  | "forbidden"
  | "internal_error";

export type ServerMessage =
  | { type: "welcome"; server_version: string; authenticated: boolean; device_id?: string; device_name?: string }
  | { type: "error"; code: ErrorCode; message: string; session_id?: string; retry_after_ms?: number }
  | { type: "pong" }
  | { type: "sessions"; sessions: SessionSummary[] }
  | { type: "session_history"; session_id: string; data: string; total_bytes: number }
  | { type: "pty_bytes"; session_id: string; data: string }
  | { type: "input_ack"; session_id: string; client_msg_id: string }
  | { type: "pty_resized"; session_id: string; cols: number; rows: number }
  | { type: "session_renamed"; session_id: string; new_name: string }
  | { type: "session_ended"; session_id: string; exit_code: number | null }
  | {
      type: "waiting_for_input";
      session_id: string;
      timestamp: string;
      prompt_content: string;
      wait_type: WaitType;
      cli_type: CliType;
    }
  | { type: "waiting_cleared"; session_id: string; timestamp: string }
  | { type: "spawn_result"; success: boolean; session_id?: string; error?: string }
  | ({ type: "directory_listing"; request_id: string } & DirectoryListing)
  | ({ type: "file_content"; request_id: string } & FileContent)
  | ({ type: "file_chunk"; request_id: string } & FileChunk)
  | { type: "file_info"; request_id: string; path: string; entry: FileEntry }
  | ({ type: "search_results"; request_id: string } & SearchResults)
  | { type: "home_directory"; request_id: string; path: string }
  | { type: "allowed_roots"; request_id: string; roots: string[] }
  | { type: "operation_success"; request_id: string; operation: string; path: string; message?: string }
  | { type: "operation_error"; request_id: string; operation: string; path: string; error: FsErrorDetail }
  | {
      type: "file_changed";
      request_id?: string;
      path: string;
      change_type: ChangeKind;
      from?: string;
      new_entry?: FileEntry;
    };

export type WrapperServerMessage =
  | { type: "registered"; session_id: string }
  | { type: "input"; data: string }
  | { type: "resize"; cols: number; rows: number }
  | { type: "pong" }
  | { type: "error"; code: ErrorCode; message: string };

// What a wrapper accepts from the server; error codes stay open-ended on this side.
export const WrapperServerMessageSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("registered"), session_id: z.string() }),
  z.object({ type: z.literal("input"), data: z.string() }),
  z.object({ type: z.literal("resize"), cols: z.number().int().min(0), rows: z.number().int().min(0) }),
  z.object({ type: z.literal("pong") }),
  z.object({ type: z.literal("error"), code: z.string(), message: z.string() }),
]);
