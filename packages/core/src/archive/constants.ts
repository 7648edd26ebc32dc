import type { EntryMethod } from '../types/index.js';

/** First six bytes of every `.tns`; replaces the local header signature of entry 0. */
export const VENDOR_MAGIC = '*TIMLP';

/** `PK\x03\x04`, used for every entry after the first. */
export const LOCAL_HEADER_SIGNATURE = 0x04034b50;

/** `PK\x01\x02`. */
export const CENTRAL_HEADER_SIGNATURE = 0x02014b50;

/** `TIPD`, in place of `PK\x05\x06`. */
export const VENDOR_END_SIGNATURE = 'TIPD';

export const VERSION_NEEDED  = 20;
export const VERSION_MADE_BY = 20;

/** Fixed DOS date/time so that output does not depend on the clock. */
export const FIXED_DOS_DATETIME = 0x00200000;

export const METHOD_CODES: Readonly<Record<EntryMethod, number>> = {
  'vendor-protected': 0x0d,
  deflated          : 0x08,
};

export const MAX_UINT16 = 0xffff;
export const MAX_UINT32 = 0xffffffff;
