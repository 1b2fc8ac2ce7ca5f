import fs from 'node:fs'
import path from 'node:path'

/**
 * Write `data` to a temp file beside `file`, then rename it into place.
 * With `overwrite: false` an existing target is an error and nothing is written.
 */
export function atomicWrite(file: string, data: string | Buffer, opts: { overwrite?: boolean } = {}): void {
  fs.mkdirSync(path.dirname(file), { recursive: true })
  if (opts.overwrite === false && fs.existsSync(file)) {
    throw Object.assign(new Error(`EEXIST: file already exists, '${file}'`), { code: 'EEXIST' })
  }
  const tmp = `${file}.tmp-${process.pid}-${Date.now()}`
  try {
    fs.writeFileSync(tmp, data)
    fs.renameSync(tmp, file)
  } catch (e) {
    fs.rmSync(tmp, { force: true })
    throw e
  }
}
