import type { FileSystemEngine } from "../fs/operations.js";
import { FsError, notFound } from "../fs/errors.js";
import type { FsRequest, ServerMessage } from "../protocol.js";
import type { SessionTable } from "../sessions/session_table.js";
import type { WatchRegistry } from "./watch_registry.js";
import type { Connection } from "./connection.js";

export type FsContext = {
  engine: FileSystemEngine;
  watches: WatchRegistry;
  sessions: SessionTable;
  homeDir: string;
};

/** The path a request is about, as the client spelled it. */
export function requestPath(msg: FsRequest): string {
  switch (msg.type) {
    case "rename_path":
      return msg.old_path;
    case "copy_path":
      return msg.source;
    case "get_home_directory":
    case "get_allowed_roots":
      return "";
    case "upload_file":
      return msg.file_name;
    default:
      return msg.path;
  }
}

function success(msg: FsRequest, p: string, message?: string): ServerMessage {
  const out: Extract<ServerMessage, { type: "operation_success" }> = {
    type: "operation_success",
    request_id: msg.request_id,
    operation: msg.type,
    path: p,
  };
  if (message !== undefined) out.message = message;
  return out;
}

async function run(ctx: FsContext, conn: Connection, msg: FsRequest): Promise<ServerMessage> {
  const { engine } = ctx;
  switch (msg.type) {
    case "list_directory": {
      const listing = await engine.listDirectory(msg.path, {
        includeHidden: msg.include_hidden,
        sortBy: msg.sort_by,
        sortOrder: msg.sort_order,
      });
      return { type: "directory_listing", request_id: msg.request_id, ...listing };
    }
    case "read_file": {
      const content = await engine.readFile(msg.path, { offset: msg.offset, length: msg.length, encoding: msg.encoding });
      return { type: "file_content", request_id: msg.request_id, ...content };
    }
    case "read_file_chunk": {
      const chunk = await engine.readFileChunk(msg.path, msg.chunk_index, msg.chunk_size);
      return { type: "file_chunk", request_id: msg.request_id, ...chunk };
    }
    case "write_file": {
      const r = await engine.writeFile(msg.path, msg.content, { encoding: msg.encoding, createParents: msg.create_parents });
      return success(msg, r.path, `wrote ${r.bytes} bytes`);
    }
    case "create_directory": {
      const r = await engine.createDirectory(msg.path, msg.recursive);
      return success(msg, r.path);
    }
    case "delete_path": {
      const r = await engine.deletePath(msg.path, msg.recursive);
      return success(msg, r.path);
    }
    case "rename_path": {
      const r = await engine.renamePath(msg.old_path, msg.new_path);
      return success(msg, r.path);
    }
    case "copy_path": {
      const r = await engine.copyPath(msg.source, msg.destination, msg.recursive);
      return success(msg, r.path, `copied ${r.bytes} bytes`);
    }
    case "get_file_info": {
      const entry = await engine.getFileInfo(msg.path);
      return { type: "file_info", request_id: msg.request_id, path: entry.path, entry };
    }
    case "search_files": {
      const results = await engine.searchFiles(msg.path, {
        pattern: msg.pattern,
        contentPattern: msg.content_pattern,
        maxDepth: msg.max_depth,
        maxResults: msg.max_results,
      });
      return { type: "search_results", request_id: msg.request_id, ...results };
    }
    case "watch_directory": {
      const dir = await ctx.watches.watch(conn, msg.path, msg.request_id);
      return success(msg, dir);
    }
    case "unwatch_directory": {
      const dir = await ctx.watches.unwatch(conn, msg.path);
      return success(msg, dir);
    }
    case "get_home_directory": {
      const home = engine.homeDirectory(ctx.homeDir);
      if (home === null) throw notFound("~");
      return { type: "home_directory", request_id: msg.request_id, path: home };
    }
    case "get_allowed_roots":
      return { type: "allowed_roots", request_id: msg.request_id, roots: [...engine.policy.roots] };
    case "upload_file": {
      const session = ctx.sessions.get(msg.session_id);
      if (!session) throw notFound(`session:${msg.session_id}`);
      const r = await engine.uploadFile(session.projectPath, msg.file_name, msg.content_base64);
      return success(msg, r.path, `uploaded ${r.bytes} bytes`);
    }
  }
}

/** Filesystem failures become operation_error; anything else propagates to the dispatcher. */
export async function handleFsRequest(ctx: FsContext, conn: Connection, msg: FsRequest): Promise<ServerMessage> {
  try {
    return await run(ctx, conn, msg);
  } catch (err) {
    if (!(err instanceof FsError)) throw err;
    return { type: "operation_error", request_id: msg.request_id, operation: msg.type, path: requestPath(msg), error: err.detail };
  }
}
