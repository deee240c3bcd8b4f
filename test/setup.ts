// Keeps commits made by tests independent of the developer's git identity and config.

const TEST_GIT_ENV: Record<string, string> = {
  GIT_AUTHOR_NAME: "conductor-test",
  GIT_AUTHOR_EMAIL: "conductor-test@example.com",
  GIT_COMMITTER_NAME: "conductor-test",
  GIT_COMMITTER_EMAIL: "conductor-test@example.com",
  GIT_CONFIG_NOSYSTEM: "1",
};

for (const [key, value] of Object.entries(TEST_GIT_ENV)) {
  process.env[key] = value;
}
