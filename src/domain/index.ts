export {
  INITIAL_VERSION,
  parseVersion,
  formatVersion,
  renderVersionFile,
  incrementVersion,
  type VersionParseResult,
} from "./version";

export { firstNonBlankLine } from "./text";
