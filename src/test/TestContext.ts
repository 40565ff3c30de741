import { Effect, Layer } from "effect";
import { FileSystem } from "@effect/platform";

import {
  FileStatServiceTag,
  FileNotFound,
  FilePermissionDenied
} from "../infra/FileStatService";
import {
  DirectoryServiceTag,
  DirectoryNotFound,
  DirectoryPermissionDenied,
  NotADirectory,
  byName
} from "../infra/DirectoryService";
import { AccountServiceTag, fromDatabases } from "../infra/AccountService";
import { S_IFDIR, S_IFLNK, S_IFREG } from "../lib/fileMode";

export type VirtualKind = "file" | "directory" | "symlink";

export interface VirtualNode {
  kind: VirtualKind;
  /** Permission and special bits only; the type bits come from `kind` */
  mode: number;
  uid: number;
  gid: number;
  statDenied?: boolean;
  listDenied?: boolean;
  /** Listed by its parent, gone by the time it is inspected */
  vanished?: boolean;
  /** Symlinks only: the path a listing through the link reaches */
  target?: string;
}

export interface NodeOptions {
  mode?: number;
  uid?: number;
  gid?: number;
  statDenied?: boolean;
  listDenied?: boolean;
  vanished?: boolean;
  target?: string;
}

export interface CallLog {
  lstat: string[];
  list: string[];
  writeFile: string[];
}

export interface TestContext {
  nodes: Map<string, VirtualNode>;
  users: Map<number, string>;
  groups: Map<number, string>;
  writes: Map<string, string>;
  calls: CallLog;
  addDirectory: (path: string, options?: NodeOptions) => void;
  addFile: (path: string, options?: NodeOptions) => void;
  addSymlink: (path: string, options?: NodeOptions) => void;
  addUser: (uid: number, name: string) => void;
  addGroup: (gid: number, name: string) => void;
  /** Listing this path never completes */
  hangListing: (path: string) => void;
  layer: Layer.Layer<
    FileStatServiceTag | DirectoryServiceTag | AccountServiceTag | FileSystem.FileSystem
  >;
}

const TYPE_BITS: Record<VirtualKind, number> = {
  file: S_IFREG,
  directory: S_IFDIR,
  symlink: S_IFLNK
};

const parentOf = (path: string): string => path.slice(0, path.lastIndexOf("/")) || "/";

const nameOf = (path: string): string => path.slice(path.lastIndexOf("/") + 1);

/**
 * In-memory filesystem with a passwd/group database. Users 0 (root) and
 * group 0 (root) exist by default.
 */
export function createTestContext(): TestContext {
  const nodes = new Map<string, VirtualNode>();
  const users = new Map<number, string>([[0, "root"]]);
  const groups = new Map<number, string>([[0, "root"]]);
  const writes = new Map<string, string>();
  const hanging = new Set<string>();

  const calls: CallLog = {
    lstat: [],
    list: [],
    writeFile: []
  };

  const add = (kind: VirtualKind, defaultMode: number) => (path: string, options: NodeOptions = {}) => {
    nodes.set(path, {
      kind,
      mode: options.mode ?? defaultMode,
      uid: options.uid ?? 0,
      gid: options.gid ?? 0,
      statDenied: options.statDenied,
      listDenied: options.listDenied,
      vanished: options.vanished,
      target: options.target
    });
  };

  /** Follows links among the parent components of a path */
  const throughLinks = (path: string): string => {
    for (const [linkPath, link] of nodes) {
      if (link.kind === "symlink" && link.target !== undefined && path.startsWith(`${linkPath}/`)) {
        return throughLinks(link.target + path.slice(linkPath.length));
      }
    }
    return path;
  };

  const mockFileStatService = Layer.succeed(FileStatServiceTag, {
    lstat: (path: string) => {
      calls.lstat.push(path);

      const node = nodes.get(throughLinks(path));
      if (!node || node.vanished) {
        return Effect.fail(new FileNotFound({ path }));
      }
      if (node.statDenied) {
        return Effect.fail(new FilePermissionDenied({ path }));
      }
      return Effect.succeed({ mode: TYPE_BITS[node.kind] | node.mode, uid: node.uid, gid: node.gid });
    }
  });

  const mockDirectoryService = Layer.succeed(DirectoryServiceTag, {
    list: (path: string) => {
      calls.list.push(path);
      if (hanging.has(path)) {
        return Effect.never;
      }

      const resolved = throughLinks(path);
      const linked = nodes.get(resolved);
      const listed = linked?.kind === "symlink" && linked.target !== undefined ? throughLinks(linked.target) : resolved;
      const node = nodes.get(listed);
      if (!node || node.vanished) {
        return Effect.fail(new DirectoryNotFound({ path }));
      }
      if (node.kind !== "directory") {
        return Effect.fail(new NotADirectory({ path }));
      }
      if (node.listDenied) {
        return Effect.fail(new DirectoryPermissionDenied({ path }));
      }

      const entries = Array.from(nodes.entries())
        .filter(([childPath]) => childPath !== listed && parentOf(childPath) === listed)
        .map(([childPath, child]) => ({ name: nameOf(childPath), isDirectory: child.kind === "directory" }))
        .sort(byName);

      return Effect.succeed(entries);
    }
  });

  const mockAccountService = Layer.sync(AccountServiceTag, () => fromDatabases(users, groups));

  const mockFileSystem = FileSystem.layerNoop({
    writeFileString: (path: string, data: string) => {
      calls.writeFile.push(path);
      writes.set(path, data);
      return Effect.void;
    }
  });

  const layer = Layer.mergeAll(
    mockFileStatService,
    mockDirectoryService,
    mockAccountService,
    mockFileSystem
  );

  return {
    nodes,
    users,
    groups,
    writes,
    calls,
    addDirectory: add("directory", 0o755),
    addFile: add("file", 0o644),
    addSymlink: add("symlink", 0o777),
    addUser(uid: number, name: string) {
      users.set(uid, name);
    },
    addGroup(gid: number, name: string) {
      groups.set(gid, name);
    },
    hangListing(path: string) {
      hanging.add(path);
    },
    layer
  };
}
