// MusicXML importers
export { parse } from './musicxml';
export { parseCompressed, isCompressed, parseAuto, findRootFile } from './musicxml-compressed';
