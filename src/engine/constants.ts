export const TESSERACT_CMD = 'tesseract';

export const DEFAULT_LANGUAGE = 'eng';
export const DEFAULT_DPI = 300;
/** Fully automatic page segmentation, no OSD */
export const DEFAULT_PSM = 3;
/** Default engine: whatever the installed traineddata supports */
export const DEFAULT_OEM = 3;
export const DEFAULT_TIMEOUT_MS = 30_000;
/** Largest delay setTimeout honours */
export const MAX_TIMEOUT_MS = 2_147_483_647;
export const DEFAULT_ENCODING: BufferEncoding = 'utf-8';

export const MAX_PSM = 13;
export const MAX_OEM = 3;

export const TEMP_DIR_PREFIX = 'tesspipe-';
