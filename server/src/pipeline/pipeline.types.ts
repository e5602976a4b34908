import { ArchiveService } from '../services/archive.service';
import { BackgroundRemover } from '../services/background-removal.service';
import { ImageGenerator } from '../services/image-generator.service';
import { ImageService } from '../services/image.service';
import { SpriteExporterService } from '../services/sprite-exporter.service';
import { SpriteLocator } from '../services/sprite-locator.service';

/**
 * Stateless services a pipeline run draws on. Collaborators and the locator
 * are the only members that may leave the calling thread.
 */
export interface PipelineDependencies {
  imageService: ImageService;
  spriteLocator: SpriteLocator;
  spriteExporter: SpriteExporterService;
  archiveService: ArchiveService;
  backgroundRemover: BackgroundRemover;
  imageGenerator: ImageGenerator | null;
}
