export {
  EXECUTABLE_NAME,
  UTILITY_TEMP_DIR,
  UTILITY_DOWNLOAD_URLS,
} from "./defaults.js";
export { loadSettings, executablePath } from "./loader.js";
export { remotePathFromUrl, joinRemote } from "./remote.js";
