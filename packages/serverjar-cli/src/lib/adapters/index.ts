export { createNodeFetchTransport, DEFAULT_USER_AGENT } from "./node-fetch-transport.js";
export { createFetchDownloadService, PART_SUFFIX } from "./fetch-download.js";
