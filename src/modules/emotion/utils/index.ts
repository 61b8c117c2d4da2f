/**
 * Sensor labels arrive in any case and with stray whitespace
 */
export function normalizeEmotionLabel(label: string): string {
  return label.trim().toLowerCase();
}
