export { EvsBackend, type EvsBackendOptions, type FileSize } from "./backend.js";
