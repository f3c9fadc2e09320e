export { verifyArchive } from "./verifier.js";
