/**
 * Character Prompt Configuration
 * Persona defaults and the system preamble sent ahead of every transcript.
 *
 * CHARACTER_PERSONA overrides the whole persona text (useful for A/B testing);
 * CHARACTER_NAME and CHARACTER_LANGUAGE are substituted into the preamble.
 */

import { CharacterConfig } from '../types';

export const DEFAULT_CHARACTER_NAME = 'Nana';
export const DEFAULT_CHARACTER_LANGUAGE = 'en';

export function defaultPersona(name: string): string {
  return (
    `You are ${name}, a helpful and friendly AI companion. ` +
    'You are cheerful, supportive, and always ready to help. ' +
    'Keep your responses concise and natural, as if speaking in a conversation. ' +
    'You can help with information, answer questions, or just chat. ' +
    'Prefer short answers.'
  );
}

const characterName = process.env.CHARACTER_NAME || DEFAULT_CHARACTER_NAME;

export const characterConfig: Readonly<CharacterConfig> = Object.freeze({
  name: characterName,
  persona: process.env.CHARACTER_PERSONA || defaultPersona(characterName),
  language: process.env.CHARACTER_LANGUAGE || DEFAULT_CHARACTER_LANGUAGE,
});

/**
 * English display name for a language code ("en" -> "English").
 * Unknown or malformed codes are returned unchanged.
 */
export function languageDisplayName(code: string): string {
  try {
    return new Intl.DisplayNames(['en'], { type: 'language' }).of(code) ?? code;
  } catch (error) {
    if (error instanceof RangeError) {
      return code;
    }
    throw error;
  }
}

/**
 * System preamble: persona, character name and reply language
 */
export function buildPreamble(character: Readonly<CharacterConfig>): string {
  return [
    character.persona,
    `Your name is ${character.name}.`,
    `Always reply in ${languageDisplayName(character.language)}.`,
    'Your replies are spoken aloud, so avoid markdown, lists and emoji.',
  ].join('\n');
}
