/**
 * Batch synchronisation between a local notes folder and the device.
 *
 * Every batch runs with the device's document service stopped, so the
 * catalog is not rewritten underneath a transfer. Documents are processed
 * one at a time; a failure is recorded in the report and the batch moves on.
 */
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { convertPdfToMarkdown, convertToPdf, documentTitle } from '../converter';
import { ConversionError, UnsupportedFileError } from '../core/errors';
import type { ReconstructionOptions, RenderingOptions } from '../core/options';
import { silentLogger, type Logger } from '../logger';
import type { PageTextSource } from '../pdf/pdf-text-source';
import type { Catalog, DocumentFileType, SyncReport, Transport } from './types';

export const DEFAULT_SERVICE_NAME = 'xochitl';

const SOURCE_EXTENSIONS = new Set(['.md', '.markdown', '.yml', '.yaml', '.conf', '.ini', '.config']);

const DOCUMENT_TYPES: Record<string, DocumentFileType> = {
  '.pdf': 'pdf',
  '.epub': 'epub',
};

export interface ServiceSettings {
  /** Stop the document service before the batch and restart it after. @default true */
  restartService?: boolean;
  /** @default 'xochitl' */
  serviceName?: string;
  logger?: Logger;
}

export interface DeviceDeps extends ServiceSettings {
  transport: Transport;
  catalog: Catalog;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

function emptyReport(): SyncReport {
  return { completed: [], skipped: [], failed: [] };
}

/**
 * Run `fn` with the device's document service stopped.
 *
 * The service is restarted even when `fn` fails; the original failure is
 * rethrown and a failed restart is logged.
 */
export async function withServicePaused<T>(
  transport: Transport,
  settings: ServiceSettings,
  fn: () => Promise<T>,
): Promise<T> {
  const enabled = settings.restartService ?? true;
  const service = settings.serviceName ?? DEFAULT_SERVICE_NAME;
  const logger = settings.logger ?? silentLogger;

  if (!enabled) {
    return fn();
  }

  logger.info(`stopping ${service}...`);
  await transport.runCommand(`systemctl stop ${service}`);

  let result: T;
  try {
    result = await fn();
  } catch (err) {
    logger.info(`restarting ${service}...`);
    await transport.runCommand(`systemctl restart ${service}`).catch((restartErr: unknown) => {
      logger.error(`failed to restart ${service}`, restartErr);
    });
    throw err;
  }

  logger.info(`restarting ${service}...`);
  await transport.runCommand(`systemctl restart ${service}`);
  return result;
}

/**
 * Expand files and directories into a sorted list of files.
 */
export async function collectFiles(paths: readonly string[]): Promise<string[]> {
  const files: string[] = [];

  async function visit(target: string): Promise<void> {
    const stat = await fs.stat(target);
    if (!stat.isDirectory()) {
      files.push(target);
      return;
    }
    const entries = await fs.readdir(target, { withFileTypes: true });
    for (const entry of entries) {
      await visit(path.join(target, entry.name));
    }
  }

  for (const target of paths) {
    await visit(target);
  }
  return files.sort();
}

/**
 * Convert notes to PDF and upload them.
 *
 * Files whose extension is not a known source type are skipped.
 */
export async function pushNotes(
  paths: readonly string[],
  options: RenderingOptions,
  deps: DeviceDeps,
): Promise<SyncReport> {
  const logger = deps.logger ?? silentLogger;
  const files = await collectFiles(paths);
  const report = emptyReport();

  await withServicePaused(deps.transport, deps, async () => {
    for (const file of files) {
      if (!SOURCE_EXTENSIONS.has(path.extname(file).toLowerCase())) {
        report.skipped.push(file);
        continue;
      }
      logger.info(`Converting and uploading: ${file}`);
      try {
        const content = await fs.readFile(file);
        const { pdf } = await convertToPdf(file, content, options);
        const { path: remotePath } = await deps.catalog.registerDocument(documentTitle(file), 'pdf');
        await deps.transport.upload(pdf, remotePath);
        report.completed.push(file);
      } catch (err) {
        logger.warn(`failed to convert ${file}`, err);
        report.failed.push({ path: file, error: toError(err) });
      }
    }
  });

  return report;
}

/**
 * Upload existing PDF and EPUB files unchanged.
 *
 * Any other file is recorded as an {@link UnsupportedFileError}.
 */
export async function uploadDocuments(
  paths: readonly string[],
  deps: DeviceDeps,
): Promise<SyncReport> {
  const logger = deps.logger ?? silentLogger;
  const files = await collectFiles(paths);
  const report = emptyReport();

  await withServicePaused(deps.transport, deps, async () => {
    for (const file of files) {
      const fileType = DOCUMENT_TYPES[path.extname(file).toLowerCase()];
      try {
        if (!fileType) {
          throw new UnsupportedFileError(file);
        }
        logger.info(`Uploading: ${file}`);
        const data = await fs.readFile(file);
        const { path: remotePath } = await deps.catalog.registerDocument(documentTitle(file), fileType);
        await deps.transport.upload(data, remotePath);
        report.completed.push(file);
      } catch (err) {
        logger.warn(`failed to upload ${file}`, err);
        report.failed.push({ path: file, error: toError(err) });
      }
    }
  });

  return report;
}

export interface PullSettings {
  inboxDir: string;
  options: ReconstructionOptions;
  textSource: PageTextSource;
  /** Date written into frontmatter. @default now */
  date?: Date;
}

/**
 * Download every device document and reconstruct it as Markdown in the
 * inbox. Documents that already have a Markdown file there are skipped.
 */
export async function pullDocuments(settings: PullSettings, deps: DeviceDeps): Promise<SyncReport> {
  const logger = deps.logger ?? silentLogger;
  const report = emptyReport();

  await fs.mkdir(settings.inboxDir, { recursive: true });
  const documents = await deps.catalog.listDocuments();

  for (const document of documents) {
    const mdPath = path.join(settings.inboxDir, `${document.name}.md`);
    logger.info(`Processing: ${document.name}`);

    const exists = await fs.stat(mdPath).then(
      () => true,
      () => false,
    );
    if (exists) {
      logger.info(`Skipping ${document.name} (already exists)`);
      report.skipped.push(mdPath);
      continue;
    }

    try {
      const pdf = await deps.transport.download(deps.catalog.documentPath(document.id));
      const { markdown } = await convertPdfToMarkdown(pdf, document.name, settings.options, settings.textSource, {
        date: settings.date,
        logger,
      });
      await fs.writeFile(mdPath, markdown, 'utf8');
      report.completed.push(mdPath);
      logger.info(`Successfully converted: ${document.name}`);
    } catch (err) {
      logger.warn(`failed to convert ${document.name}`, err);
      report.failed.push({ path: mdPath, error: toError(err) });
    }
  }

  return report;
}

/**
 * Remove every device document whose name does not match `pattern`.
 *
 * @param pattern - Regular expression source, e.g. `Quick sheets|Notebook tutorial`.
 * @returns Names of the removed documents.
 */
export async function cleanupDevice(pattern: string, deps: DeviceDeps): Promise<string[]> {
  if (pattern.trim().length === 0) {
    throw new ConversionError('An except pattern is required');
  }
  let keep: RegExp;
  try {
    keep = new RegExp(pattern);
  } catch (err) {
    throw new ConversionError(`Invalid except pattern: ${pattern}`, { cause: err });
  }

  const logger = deps.logger ?? silentLogger;
  return withServicePaused(deps.transport, deps, async () => {
    logger.info(`Cleaning up files except those matching: ${pattern}`);
    const removed: string[] = [];
    for (const document of await deps.catalog.listDocuments()) {
      if (keep.test(document.name)) continue;
      await deps.catalog.removeDocument(document.id);
      removed.push(document.name);
    }
    return removed;
  });
}
