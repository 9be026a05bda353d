/**
 * Node.js FileSystem Adapter
 *
 * Implements the FileSystem port using fs/promises, path and fdir.
 */

import * as fs from "fs/promises";
import { statSync } from "fs";
import * as path from "path";
import { fdir } from "fdir";
import type { FileSystem, DirectoryWalk } from "../../domain/ports";

/**
 * Node.js implementation of the FileSystem port.
 */
export class NodeFileSystem implements FileSystem {
  async readFile(filepath: string): Promise<string> {
    return fs.readFile(filepath, "utf-8");
  }

  walk(rootDir: string, accept: (filepath: string) => boolean): DirectoryWalk {
    // fdir would crawl the working directory for an empty root
    if (rootDir === "") {
      return {
        files: [],
        error: new Error("ENOENT: no such file or directory, scandir ''"),
      };
    }

    // Collected from inside the filter so that paths found before a
    // failing directory survive the throw.
    const files: string[] = [];

    // Synchronous crawl: directories are read depth-first in readdir order
    // and the first unreadable one throws, which stops the walk there.
    const crawler = new fdir()
      .withFullPaths()
      .withErrors()
      .filter((filePath, isDirectory) => {
        if (isDirectory || !accept(filePath) || !isRegularFile(filePath)) {
          return false;
        }
        files.push(filePath);
        return true;
      })
      .crawl(rootDir);

    try {
      crawler.sync();
      return { files };
    } catch (error) {
      return { files, error };
    }
  }

  extname(filepath: string): string {
    return path.extname(filepath);
  }
}

/**
 * fdir lists symlinks as files. Follow them and keep only those that
 * resolve to a regular file; dangling links and links to directories drop out.
 */
function isRegularFile(filePath: string): boolean {
  return statSync(filePath, { throwIfNoEntry: false })?.isFile() ?? false;
}

/**
 * Default singleton instance
 */
export const nodeFileSystem = new NodeFileSystem();
