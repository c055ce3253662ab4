import fs from "fs-extra"
import path from "path"
import { v4 as uuidv4 } from "uuid"
import { errorMessage } from "./errors"
import type { Logger } from "./logger"

export interface ArtifactPaths {
  original: string
  resized: string
}

// longest extension carried over from the object name
const maxExtensionLength = 16

/**
 * Local scratch files owned by one record. Names come from a fresh uuid, never
 * from the object key, so long keys fit the filesystem's name limit and records
 * pointing at objects with the same basename never share a path.
 */
export class TemporaryArtifacts {
  readonly paths: ArtifactPaths

  constructor(scratchDir: string, baseName: string, private readonly logger: Logger, id = uuidv4()) {
    const extension = path.extname(baseName).slice(0, maxExtensionLength)
    this.paths = {
      original: path.join(scratchDir, `${id}-original${extension}`),
      resized: path.join(scratchDir, `${id}-resized${extension}`),
    }
  }

  async write(target: keyof ArtifactPaths, bytes: Buffer) {
    await fs.outputFile(this.paths[target], bytes)
  }

  async release() {
    for (const file of Object.values(this.paths)) {
      try {
        await fs.remove(file)
      } catch (err) {
        this.logger.warn(`Warning: Could not clean up temp file ${file}: ${errorMessage(err)}`)
      }
    }
  }
}
