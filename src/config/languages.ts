export interface LanguageInfo {
  name: string;
  flag: string;
}

export const SUPPORTED_LANGUAGES: Readonly<Record<string, LanguageInfo>> = {
  en: { name: 'English', flag: '🇺🇸' },
  tr: { name: 'Turkish', flag: '🇹🇷' },
  es: { name: 'Spanish', flag: '🇪🇸' },
  fr: { name: 'French', flag: '🇫🇷' },
  de: { name: 'German', flag: '🇩🇪' },
  it: { name: 'Italian', flag: '🇮🇹' },
  pt: { name: 'Portuguese', flag: '🇵🇹' },
  ru: { name: 'Russian', flag: '🇷🇺' },
  ja: { name: 'Japanese', flag: '🇯🇵' },
  ko: { name: 'Korean', flag: '🇰🇷' },
  zh: { name: 'Chinese', flag: '🇨🇳' },
  ar: { name: 'Arabic', flag: '🇦🇪' },
  nl: { name: 'Dutch', flag: '🇳🇱' },
  pl: { name: 'Polish', flag: '🇵🇱' },
  sv: { name: 'Swedish', flag: '🇸🇪' },
  hi: { name: 'Hindi', flag: '🇮🇳' },
  cs: { name: 'Czech', flag: '🇨🇿' },
  da: { name: 'Danish', flag: '🇩🇰' },
  fi: { name: 'Finnish', flag: '🇫🇮' },
  el: { name: 'Greek', flag: '🇬🇷' },
  hu: { name: 'Hungarian', flag: '🇭🇺' },
  id: { name: 'Indonesian', flag: '🇮🇩' },
  no: { name: 'Norwegian', flag: '🇳🇴' },
  ro: { name: 'Romanian', flag: '🇷🇴' },
  sk: { name: 'Slovak', flag: '🇸🇰' },
  uk: { name: 'Ukrainian', flag: '🇺🇦' },
  vi: { name: 'Vietnamese', flag: '🇻🇳' },
  th: { name: 'Thai', flag: '🇹🇭' },
  bg: { name: 'Bulgarian', flag: '🇧🇬' },
};

export function isSupportedLanguage(code: string): boolean {
  return Object.prototype.hasOwnProperty.call(SUPPORTED_LANGUAGES, code);
}

/**
 * Reduce a service language tag to the two-letter code used here
 * ("zh-CN" -> "zh", "EN" -> "en", "eng" -> "en" for ISO 639-3 English).
 */
export function normalizeLanguageCode(code: string): string {
  const primary = code.trim().toLowerCase().split(/[-_]/)[0] ?? '';
  return ISO3_TO_ISO1[primary] ?? primary;
}

// Speech-to-text reports ISO 639-3 codes.
const ISO3_TO_ISO1: Readonly<Record<string, string>> = {
  eng: 'en', tur: 'tr', spa: 'es', fra: 'fr', deu: 'de', ita: 'it', por: 'pt',
  rus: 'ru', jpn: 'ja', kor: 'ko', zho: 'zh', cmn: 'zh', ara: 'ar', nld: 'nl',
  pol: 'pl', swe: 'sv', hin: 'hi', ces: 'cs', dan: 'da', fin: 'fi', ell: 'el',
  hun: 'hu', ind: 'id', nor: 'no', nob: 'no', ron: 'ro', slk: 'sk', ukr: 'uk',
  vie: 'vi', tha: 'th', bul: 'bg',
};
