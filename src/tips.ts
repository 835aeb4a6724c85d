import type { RandomSource } from './types.js';

export const TIPS: readonly string[] = Object.freeze([
  'Замечайте свои эмоции: назовите чувство вслух — это снижает его интенсивность.',
  "Говорите через 'я-сообщения': 'я чувствую…' вместо 'ты всегда…'.",
  'Сохраняйте паузу перед ответом — 3 глубоких вдоха помогают вернуть ясность.',
  'Формулируйте просьбы конкретно: что, когда и как было бы полезно.',
  'Практикуйте благодарность: ежедневно фиксируйте 3 вещи, за которые благодарны.',
  "Отделяйте факт от интерпретации: 'Он не ответил 2 часа' ≠ 'Ему всё равно'.",
  'Дайте себе право на отдых без чувства вины — это ресурс для семьи.',
  "Ставьте границы мягко: 'Мне важно… поэтому я…'.",
]);

/**
 * Pick a tip uniformly at random.
 */
export function pickTip(random: RandomSource = Math.random, tips: readonly string[] = TIPS): string {
  // Clamp so a source returning exactly 1 still lands on the last tip
  const index = Math.min(Math.floor(random() * tips.length), tips.length - 1);
  return tips[index];
}
