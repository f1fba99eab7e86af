export {
  establishSession,
  remoteSpec,
  type Session,
  type HandshakeDeps,
} from "./handshake.js";
