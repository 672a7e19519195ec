export const BUILDBRIEF_FILES = {
  config: 'buildbrief.config.json',
  defaultBrief: 'brief.md',
} as const;

export type BuildBriefFileKey = keyof typeof BUILDBRIEF_FILES;

export const ENV_KEYS = {
  anthropic: 'ANTHROPIC_API_KEY',
  tavily: 'TAVILY_API_KEY',
  github: 'GITHUB_TOKEN',
} as const;
