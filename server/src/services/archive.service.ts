import fs from 'fs';
import path from 'path';
import { zipSync } from 'fflate';
import { errorMessage, PackagingError } from '../errors/sprite-errors';
import { ORIGINALS_DIR, OriginalSprite, SpriteAsset } from '../models/sprite.types';

export const BACKGROUND_REMOVED_ENTRY = 'debug_background_removal.png';

export interface ArchiveContents {
  assets: SpriteAsset[];
  /** Unresized crops, stored under `original_sprites/` */
  originals?: OriginalSprite[];
  /** The whole sheet after background removal */
  backgroundRemoved?: Buffer;
}

const spriteFileName = (index: number) => `sprite_${String(index).padStart(3, '0')}.png`;

export class ArchiveService {
  /**
   * Relative path of an asset inside the archive, e.g. `large/sprite_007.png`
   */
  entryPath(asset: SpriteAsset): string {
    return `${asset.sizeName}/${spriteFileName(asset.index)}`;
  }

  /**
   * Every archive entry keyed by its relative path
   */
  entries(contents: ArchiveContents): Record<string, Uint8Array> {
    const files: Record<string, Uint8Array> = {};
    const add = (entry: string, data: Uint8Array) => {
      if (files[entry]) {
        throw new PackagingError(`Duplicate archive entry ${entry}`);
      }
      files[entry] = data;
    };

    for (const asset of contents.assets) {
      add(this.entryPath(asset), asset.png);
    }
    for (const original of contents.originals ?? []) {
      add(`${ORIGINALS_DIR}/${spriteFileName(original.index)}`, original.png);
    }
    if (contents.backgroundRemoved) {
      add(BACKGROUND_REMOVED_ENTRY, contents.backgroundRemoved);
    }
    return files;
  }

  /**
   * Zip the sized sprites (one directory per output size) and any extras
   */
  pack(contents: ArchiveContents): Uint8Array {
    // PNG data is already deflated
    return zipSync(this.entries(contents), { level: 0 });
  }

  /**
   * Write the zip archive to `<resultDir>/sprites_<taskId>.zip`. With a
   * staging directory the zip is written there first and renamed into place.
   *
   * @returns absolute archive path
   */
  async writeArchive(contents: ArchiveContents, resultDir: string, taskId: string, stagingDir?: string): Promise<string> {
    const archivePath = path.join(resultDir, `sprites_${taskId}.zip`);
    try {
      const zipped = this.pack(contents);
      await fs.promises.mkdir(resultDir, { recursive: true });
      if (stagingDir) {
        const staged = path.join(stagingDir, path.basename(archivePath));
        await fs.promises.writeFile(staged, zipped);
        await this.moveFile(staged, archivePath);
      } else {
        await fs.promises.writeFile(archivePath, zipped);
      }
      return archivePath;
    } catch (error) {
      if (error instanceof PackagingError) throw error;
      throw new PackagingError(`Failed to write archive ${archivePath}: ${errorMessage(error)}`);
    }
  }

  /**
   * Write the archive layout as plain directories under `outputDir`
   */
  async writeDirectory(contents: ArchiveContents, outputDir: string): Promise<string[]> {
    const files = this.entries(contents);
    const written: string[] = [];
    try {
      for (const [entry, data] of Object.entries(files)) {
        const target = path.join(outputDir, entry);
        await fs.promises.mkdir(path.dirname(target), { recursive: true });
        await fs.promises.writeFile(target, data);
        written.push(target);
      }
    } catch (error) {
      throw new PackagingError(`Failed to write sprites to ${outputDir}: ${errorMessage(error)}`);
    }
    return written;
  }

  private async moveFile(from: string, to: string): Promise<void> {
    try {
      await fs.promises.rename(from, to);
    } catch (error) {
      // rename cannot cross filesystems
      if (error instanceof Error && 'code' in error && error.code === 'EXDEV') {
        await fs.promises.copyFile(from, to);
        await fs.promises.rm(from, { force: true });
        return;
      }
      throw error;
    }
  }
}
