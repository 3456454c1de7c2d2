export { parseBoxes } from './boxes.js';
export { parseData } from './data.js';
export { parseOsd } from './osd.js';
export { parseScriptConfidence, parseDeskewAngle } from './scalars.js';
export { parseParameters } from './parameters.js';
export { parseLanguages, loadKnownLanguages } from './languages.js';
export { parseVersion } from './version.js';
