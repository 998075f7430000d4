/**
 * Meal plan content: the prompt sent to Gemini, the dish names kept in
 * history, and the Telegram message wrapped around the generated plan.
 */

import { longDate } from "../utils/calendar.js";
import type { HistoryState } from "./types.js";

const RECENT_RECORDS = 14;
const MAX_LABEL_LENGTH = 120;
const SECTION_HEADER = /^[^\p{L}\p{N}]*(desayuno|almuerzo|merienda)\s*:[^\p{L}\p{N}]*(.*)$/iu;

export const NO_RECENT_MEALS = "Ninguna todavía, es el primer plan.";

export function summarizeRecentMeals(state: HistoryState, limit: number = RECENT_RECORDS): string {
  const lines = state.records
    .slice(-limit)
    .flatMap((r) => r.items)
    .map((meal) => `- ${meal}`);
  return lines.length > 0 ? lines.join("\n") : NO_RECENT_MEALS;
}

export function buildMealPlanPrompt(recentMeals: string): string {
  return `Propón 3 recetas ecuatorianas auténticas para hoy: desayuno, almuerzo y merienda.

CONDICIONES:
- Solo ingredientes propios de Ecuador o de uso habitual en la cocina ecuatoriana
- Prioriza platos tradicionales de la Costa, la Sierra y la Amazonía
- Nombra los ingredientes como se conocen en Ecuador
- Recetas realistas para cocinar en casa un día de semana

Platos de los últimos días que NO debes repetir:
${recentMeals}

Responde EXACTAMENTE con este formato:

🌅 DESAYUNO:
[Nombre del plato]
Ingredientes: [lista]
Preparación: [pasos breves]

🌮 ALMUERZO:
[Nombre del plato]
Ingredientes: [lista]
Preparación: [pasos breves]

🌙 MERIENDA:
[Nombre del plato]
Ingredientes: [lista]
Preparación: [pasos breves]`;
}

function cleanLabel(line: string): string {
  const label = line.replace(/^[\s*#\-\[]+|[\s*#\]]+$/g, "");
  return label.length > MAX_LABEL_LENGTH ? label.slice(0, MAX_LABEL_LENGTH) : label;
}

/**
 * Dish names for the history file: the line after each section header
 * (or the text after the colon on the header line itself). Without any
 * header, the first three non-empty lines.
 */
export function extractMealLabels(plan: string): string[] {
  const lines = plan.split("\n").map((l) => l.trim());
  const labels: string[] = [];

  for (const [i, line] of lines.entries()) {
    const match = SECTION_HEADER.exec(line);
    if (!match) continue;

    const inline = cleanLabel(match[2] ?? "");
    if (inline) {
      labels.push(inline);
      continue;
    }
    const next = lines.slice(i + 1).find((l) => l.length > 0);
    if (next && !SECTION_HEADER.test(next)) {
      const label = cleanLabel(next);
      if (label) labels.push(label);
    }
  }

  if (labels.length > 0) return labels;
  return lines
    .filter((l) => l.length > 0)
    .slice(0, 3)
    .map(cleanLabel)
    .filter((l) => l.length > 0);
}

export function escapeHtml(s: string): string {
  return s.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

export interface ComposeOptions {
  timeZone: string;
  format: "html" | "plain";
}

export function composeMessage(plan: string, now: Date, options: ComposeOptions): string {
  const date = longDate(now, options.timeZone);
  if (options.format === "html") {
    return `🇪🇨 <b>Plan de Comidas Ecuatorianas</b>\n📅 ${date}\n\n${escapeHtml(plan.trim())}`;
  }
  return `🇪🇨 Plan de Comidas Ecuatorianas\n📅 ${date}\n\n${plan.trim()}`;
}
