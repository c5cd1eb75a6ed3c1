export default {
  apiBaseUrl: "https://api.taiga.io",
  projectSlug: "",
  projectId: 0,
  granularity: "daily",
  monthsBack: 6,
  outputDir: ".",
  tokenDir: ".cfd",
  pageSize: 100,
  maxPages: 20,
  requestTimeoutMs: 30000,
  includeStoriesBeforeWindow: false,
};
