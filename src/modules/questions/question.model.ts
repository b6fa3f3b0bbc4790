// modules/questions/question.model.ts

export const OPTION_LABELS = ['A', 'B', 'C', 'D'] as const;

export type OptionLabel = (typeof OPTION_LABELS)[number];

export interface Question {
  text: string;
  options: Record<OptionLabel, string>;
  correctLabel: OptionLabel; // ⚠️ сервер знает, UI — нет
}

export function isOptionLabel(value: string): value is OptionLabel {
  return (OPTION_LABELS as readonly string[]).includes(value);
}
