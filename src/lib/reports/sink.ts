import { mkdir, readdir, writeFile } from 'node:fs/promises'
import path from 'node:path'

import { getConfig } from '@/lib/env'

export interface ReportSink {
  write(fileName: string, content: string): Promise<void>
  list(): Promise<string[]>
}

export class FileReportSink implements ReportSink {
  private readonly directory: string

  constructor(directory: string = getConfig().REPORTS_DIR) {
    this.directory = path.resolve(directory)
  }

  async write(fileName: string, content: string) {
    await this.ensureDirectory()
    await writeFile(path.join(this.directory, path.basename(fileName)), content, 'utf8')
  }

  async list() {
    await this.ensureDirectory()
    const entries = await readdir(this.directory, { withFileTypes: true })

    return entries
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
      .sort()
  }

  private async ensureDirectory() {
    try {
      await mkdir(this.directory, { recursive: true })
    } catch (error) {
      console.error('[reports] failed to create reports directory', { directory: this.directory, error })
      throw new Error(`Failed to create reports directory: ${this.directory}`, { cause: error })
    }
  }
}

export class MemoryReportSink implements ReportSink {
  readonly files = new Map<string, string>()

  async write(fileName: string, content: string) {
    this.files.set(fileName, content)
  }

  async list() {
    return Array.from(this.files.keys()).sort()
  }
}
