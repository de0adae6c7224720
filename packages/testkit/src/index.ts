export { createTempDir, removeDir, writeFixture, readFixture } from "./fs.js";
