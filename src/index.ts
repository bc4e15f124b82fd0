/**
 * comicinfo-metadata
 *
 * Public entry point.
 */

export * from './services/comicinfo/index.js';
export {
  readComicInfoFromFile,
  writeComicInfoToFile,
  type ComicInfoReadResult,
  type ComicInfoWriteResult,
} from './services/comicinfo.service.js';
export { clearConfigCache, loadConfig, DEFAULT_CONFIG, type ComicInfoConfig } from './services/config.service.js';
export { createServiceLogger, logger } from './services/logger.service.js';
export { IssueJsonSchema, PageJsonSchema, type IssueJsonInput, type PageJsonInput } from './schemas/comicinfo.schemas.js';
