import { closeSync, fsyncSync, openSync, renameSync, writeSync } from 'node:fs'

/** Writes `data` and fsyncs before returning. `flags` is 'w' to replace, 'a' to append. */
export function writeDurable(filePath: string, data: string, flags: 'w' | 'a' = 'w'): void {
  const fd = openSync(filePath, flags, 0o600)
  try {
    writeSync(fd, data, null, 'utf-8')
    fsyncSync(fd)
  } finally {
    closeSync(fd)
  }
}

/** Replaces `filePath` through a sibling temp file so readers never see a partial write. */
export function replaceDurable(filePath: string, data: string): void {
  const tmpPath = `${filePath}.${process.pid}.tmp`
  writeDurable(tmpPath, data)
  renameSync(tmpPath, filePath)
}
