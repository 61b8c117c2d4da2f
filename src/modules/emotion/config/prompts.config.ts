/**
 * Emotion Interaction Prompts
 * The system-generated prompt a triggered interaction sends to the LLM in
 * place of a user message.
 */

export const emotionPrompts: Readonly<Record<string, string>> = Object.freeze({
  happy: 'The user looks happy. Respond in a cheerful way, matching their positive mood.',
  sad: "The user looks sad. Respond with empathy and ask if they're okay.",
  angry: 'The user looks upset. Respond calmly and ask if something is bothering them.',
  surprise: 'The user looks surprised. Respond with curiosity about what surprised them.',
  fear: 'The user looks worried or scared. Respond with reassurance and offer support.',
  disgust: "The user looks disgusted. Respond with concern and ask what's wrong.",
  neutral:
    "The user has a neutral expression. Respond normally and perhaps ask how they're doing.",
});

export function buildEmotionPrompt(emotion: string): string {
  return (
    emotionPrompts[emotion] ??
    `Respond to the user naturally, considering they appear ${emotion}.`
  );
}
