/**
 * ComicInfo.xml Service
 *
 * Reads and writes standalone ComicInfo.xml files, reporting the outcome as
 * a result object instead of throwing.
 */

import { readFile, writeFile } from 'fs/promises';
import { type ComicInfoErrorCode, isComicInfoError, toErrorMessage } from './comicinfo/errors.js';
import type { Issue } from './comicinfo/issue.js';
import { loadComicInfoFromXml } from './comicinfo/loader.js';
import { type XmlSerializeOptions, serializeIssueToXml } from './comicinfo/serializer.js';
import { logDebug, logError, logInfo, logWarn } from './logger.service.js';

const LOG_CONTEXT = 'comicinfo-file';

// =============================================================================
// Types
// =============================================================================

export interface ComicInfoReadResult {
  success: boolean;
  issue?: Issue;
  rawXml?: string;
  error?: string;
  errorCode?: ComicInfoErrorCode;
}

export interface ComicInfoWriteResult {
  success: boolean;
  error?: string;
  errorCode?: ComicInfoErrorCode;
}

function failure(err: unknown): { success: false; error: string; errorCode: ComicInfoErrorCode } {
  return {
    success: false,
    error: toErrorMessage(err),
    errorCode: isComicInfoError(err) ? err.code : 'FILE_ERROR',
  };
}

// =============================================================================
// File Operations
// =============================================================================

/**
 * Read ComicInfo.xml from a file (not inside an archive).
 */
export async function readComicInfoFromFile(filePath: string): Promise<ComicInfoReadResult> {
  logDebug(LOG_CONTEXT, 'Reading ComicInfo file', { filePath });
  try {
    const rawXml = await readFile(filePath, 'utf-8');
    const issue = loadComicInfoFromXml(rawXml);
    return {
      success: true,
      issue,
      rawXml,
    };
  } catch (err) {
    logWarn(LOG_CONTEXT, 'Failed to read ComicInfo file', { filePath, error: toErrorMessage(err) });
    return failure(err);
  }
}

/**
 * Write ComicInfo.xml to a file (not inside an archive).
 */
export async function writeComicInfoToFile(
  filePath: string,
  issue: Issue,
  options?: XmlSerializeOptions
): Promise<ComicInfoWriteResult> {
  try {
    const xmlString = serializeIssueToXml(issue, options);
    await writeFile(filePath, xmlString, 'utf-8');
    logInfo(LOG_CONTEXT, 'Wrote ComicInfo file', { filePath, size: xmlString.length });
    return { success: true };
  } catch (err) {
    logError(LOG_CONTEXT, err, { filePath, operation: 'write' });
    return failure(err);
  }
}
