export {
  StatusDocument,
  parseStatusDocument,
  extractTags,
  findFailureMarker,
  type StatusAttributes,
  type StatusElement,
} from "./status.js";
export { parseListing, parseListingLine, type RemoteEntry } from "./listing.js";
