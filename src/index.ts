/**
 * md2page - Markdown to fixed-layout page converter and back
 */

// High-level conversion API
export {
  convertToPdf,
  convertFileToPdf,
  convertPdfToMarkdown,
  convertPdfFile,
  renderSource,
  detectSourceKind,
  documentTitle,
} from './converter';

// Types
export type { ConvertMetadata, PdfConversionResult, SourceKind } from './types';

// Core module re-exports
export * from './core/index';

// Adapters
export { PdfPageWriter } from './pdf/pdf-page-writer';
export { PdfJsTextSource } from './pdf/pdf-text-source';
export type { PageTextSource } from './pdf/pdf-text-source';

// Device sync
export {
  withServicePaused,
  collectFiles,
  pushNotes,
  uploadDocuments,
  pullDocuments,
  cleanupDevice,
} from './sync/device-sync';
export type { DeviceDeps, PullSettings, ServiceSettings } from './sync/device-sync';
export type { Transport, Catalog, CatalogEntry, DocumentFileType, SyncFailure, SyncReport } from './sync/types';

// Logging
export { createConsoleLogger, silentLogger } from './logger';
export type { Logger } from './logger';
