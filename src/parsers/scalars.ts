const SCRIPT_CONFIDENCE_RE = /Script confidence:\s*(-?\d+(?:\.\d+)?)/;
const DESKEW_ANGLE_RE = /Deskew angle:\s*(-?\d+(?:\.\d+)?)/;

function firstNumber(re: RegExp, text: string): number {
  const match = re.exec(text);
  return match ? Number(match[1]) : 0;
}

/** Script confidence from a `--psm 0` run; 0 when the engine reported none. */
export function parseScriptConfidence(text: string): number {
  return firstNumber(SCRIPT_CONFIDENCE_RE, text);
}

/** Deskew angle from the stderr of a `--psm 2` run; 0 when absent. */
export function parseDeskewAngle(text: string): number {
  return firstNumber(DESKEW_ANGLE_RE, text);
}
