export const SUPPORTED_LANGUAGES = ['python', 'javascript', 'go', 'java', 'cpp', 'php', 'rust'] as const;

export type Language = typeof SUPPORTED_LANGUAGES[number];

const ALIASES: Record<string, Language> = {
  js: 'javascript',
};

export function isLanguage(name: string): name is Language {
  return SUPPORTED_LANGUAGES.some(lang => lang === name);
}

const DISPLAY_NAMES: Record<Language, string> = {
  python: 'Python',
  javascript: 'JavaScript',
  go: 'Go',
  java: 'Java',
  cpp: 'C++',
  php: 'PHP',
  rust: 'Rust',
};

export function displayName(name: string): string {
  const lang = normalizeLanguage(name);
  return lang ? DISPLAY_NAMES[lang] : name;
}

/** Resolve aliases (`js`) to the canonical language name; unknown names yield undefined. */
export function normalizeLanguage(name: string): Language | undefined {
  const lower = name.trim().toLowerCase();
  if (isLanguage(lower)) return lower;
  return ALIASES[lower];
}
