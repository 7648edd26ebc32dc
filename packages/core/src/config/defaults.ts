import { VariantRegistry } from './VariantRegistry.js';
import type { VariantDescriptor } from '../types/index.js';

const standard: VariantDescriptor = {
  id: 'standard',
  versionTag: '0500',
  description: 'Script document (OS 3.0.2+)',
};

VariantRegistry.register(standard);

const bitmap: VariantDescriptor = {
  id: 'bitmap',
  versionTag: '0700',
  description: 'Document carrying bitmap resources',
};

VariantRegistry.register(bitmap);

/** Archive entry names of the two protected parts. */
export const DOCUMENT_ENTRY_NAME = 'Document.xml';
export const PROBLEM_ENTRY_NAME  = 'Problem1.xml';

/** Python companion file names longer than this (UTF-8 bytes) are rejected. */
export const MAX_PYTHON_FILENAME_BYTES = 240;
