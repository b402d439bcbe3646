import * as fs from "node:fs/promises"
import type { FsOps } from "../ports/fs-ops"

export const nodeFsOps: FsOps = {
  open: (path, flags) => fs.open(path, flags),
  readFile: (path, options) => fs.readFile(path, options),
  rename: (oldPath, newPath) => fs.rename(oldPath, newPath),
  unlink: (path) => fs.unlink(path),
  mkdir: (path, options) => fs.mkdir(path, options),
  stat: (path) => fs.stat(path),
}
