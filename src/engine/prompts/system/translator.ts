/**
 * System prompt for Stage 2: Translation
 *
 * Output is voiced verbatim by the speech stage, so the model must return
 * the translation and nothing else.
 */

import type { LanguageProfile } from '../../types/common.js';

export const createTranslatorSystemPrompt = (language: LanguageProfile): string =>
  `You are an expert multilingual translator. Translate the following English text to ${language.name}. ` +
  'Provide only the direct translation, without any additional commentary or explanations. ' +
  'Be concise and accurate.';
