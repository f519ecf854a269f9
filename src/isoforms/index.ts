export { extractIsoforms, type IsoformEntry, type IsoformResult } from "./isoforms.js";
