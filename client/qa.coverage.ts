import "dotenv/config";
import { DEFAULT_OUTDIR } from "./config.js";
import { fieldCoverage } from "./utils/coverage.js";
import { ndjsonPath, readNDJSON } from "./utils/emitter.js";

const resource = process.argv[2];
if (!resource) {
  console.error("Usage: npm run qa -- <resource>");
  process.exit(1);
}

const path = ndjsonPath(process.env.OUTDIR || DEFAULT_OUTDIR, resource);
const report = fieldCoverage(readNDJSON(path));

if (!report.records) console.error(`no records in ${path}; run the fetch first`);
console.log(JSON.stringify({ resource, ...report }, null, 2));
