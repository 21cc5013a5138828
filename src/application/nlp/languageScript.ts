const SCRIPT_BY_LANGUAGE: Readonly<Record<string, RegExp>> = {
  hi: /\p{Script=Devanagari}/u,
  mr: /\p{Script=Devanagari}/u,
  ne: /\p{Script=Devanagari}/u,
  bn: /\p{Script=Bengali}/u,
  gu: /\p{Script=Gujarati}/u,
  pa: /\p{Script=Gurmukhi}/u,
  ta: /\p{Script=Tamil}/u,
  te: /\p{Script=Telugu}/u,
  kn: /\p{Script=Kannada}/u,
  ml: /\p{Script=Malayalam}/u,
  ur: /\p{Script=Arabic}/u,
  en: /\p{Script=Latin}/u,
};

const LETTER = /\p{L}/u;

/**
 * Share of letters written in the target language's script, or null for languages without a known script.
 * Region-tagged codes such as `hi-IN` use their primary subtag.
 */
export const scriptShare = (text: string, language: string): number | null => {
  const primarySubtag = language.toLowerCase().split("-")[0] ?? "";
  const script = SCRIPT_BY_LANGUAGE[primarySubtag];
  if (!script) {
    return null;
  }

  let letters = 0;
  let matching = 0;
  for (const char of text) {
    if (!LETTER.test(char)) {
      continue;
    }
    letters += 1;
    if (script.test(char)) {
      matching += 1;
    }
  }

  return letters === 0 ? 0 : matching / letters;
};

/**
 * True when most letters are already in the target script, so translation can be skipped.
 */
export const isInTargetScript = (
  text: string,
  language: string,
  threshold = 0.5,
): boolean => (scriptShare(text, language) ?? 0) > threshold;
