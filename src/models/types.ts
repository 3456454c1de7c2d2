/**
 * Result records parsed from Tesseract output.
 *
 * Plain values: built once per engine invocation, never mutated.
 */

/** One line of `makebox` output. Coordinates use a bottom-left origin. */
export interface Box {
  readonly character: string;
  readonly left: number;
  readonly bottom: number;
  readonly right: number;
  readonly top: number;
  readonly page: number;
}

/** One row of the TSV data table. */
export interface WordData {
  /** 1 page, 2 block, 3 paragraph, 4 line, 5 word */
  readonly level: number;
  readonly pageNum: number;
  readonly blockNum: number;
  readonly parNum: number;
  readonly lineNum: number;
  readonly wordNum: number;
  readonly left: number;
  readonly top: number;
  readonly width: number;
  readonly height: number;
  /** Word confidence 0-100, or -1 for non-word rows */
  readonly conf: number;
  readonly text: string;
}

/** Orientation and script detection report. */
export interface OSD {
  readonly pageNumber: number;
  readonly orientationInDegrees: number;
  /** Rotation to apply to straighten the page */
  readonly rotate: number;
  readonly orientationConfidence: number;
  readonly script: string;
  readonly scriptConfidence: number;
}

/** One entry of `--print-parameters`. */
export interface Parameter {
  readonly name: string;
  readonly value: string;
  readonly description: string;
}
