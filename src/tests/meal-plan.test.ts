/**
 * Meal plan content tests
 */

import { describe, test, expect } from "vitest";
import {
  NO_RECENT_MEALS,
  buildMealPlanPrompt,
  composeMessage,
  escapeHtml,
  extractMealLabels,
  summarizeRecentMeals,
} from "../relay/meal-plan.js";
import { emptyHistory } from "../relay/history-store.js";

const MONDAY = new Date(Date.UTC(2026, 9, 19, 12, 0, 0));

const SAMPLE_PLAN = `🌅 DESAYUNO:
Bolón de verde con queso
Ingredientes: verde, queso fresco, manteca
Preparación: Cocinar el verde, majar y formar bolas.

🌮 ALMUERZO:
**Encebollado**
Ingredientes: albacora, yuca, cebolla paiteña
Preparación: Hervir la yuca con el pescado.

🌙 MERIENDA: Seco de pollo
Ingredientes: pollo, naranjilla, cerveza
Preparación: Guisar a fuego lento.`;

describe("summarizeRecentMeals", () => {
  test("empty history gives the first-plan sentence", () => {
    expect(summarizeRecentMeals(emptyHistory())).toBe(NO_RECENT_MEALS);
  });

  test("lists every dish as a bullet", () => {
    const state = {
      records: [
        { date: "2026-10-15", items: ["Tigrillo", "Locro de papa"] },
        { date: "2026-10-16", items: ["Guatita"] },
      ],
      lastSentDate: "2026-10-16",
    };
    expect(summarizeRecentMeals(state)).toBe("- Tigrillo\n- Locro de papa\n- Guatita");
  });

  test("only the most recent records are used", () => {
    const state = {
      records: [
        { date: "2026-10-14", items: ["old"] },
        { date: "2026-10-15", items: ["newer"] },
        { date: "2026-10-16", items: ["newest"] },
      ],
      lastSentDate: "2026-10-16",
    };
    expect(summarizeRecentMeals(state, 2)).toBe("- newer\n- newest");
  });
});

describe("buildMealPlanPrompt", () => {
  test("embeds the recent dishes and the section layout", () => {
    const prompt = buildMealPlanPrompt("- Guatita");
    expect(prompt).toContain("NO debes repetir:\n- Guatita\n");
    expect(prompt).toContain("🌅 DESAYUNO:");
    expect(prompt).toContain("🌮 ALMUERZO:");
    expect(prompt).toContain("🌙 MERIENDA:");
  });
});

describe("extractMealLabels", () => {
  test("takes the dish after each section header", () => {
    expect(extractMealLabels(SAMPLE_PLAN)).toEqual(["Bolón de verde con queso", "Encebollado", "Seco de pollo"]);
  });

  test("falls back to the first three non-empty lines", () => {
    expect(extractMealLabels("Línea uno\n\nLínea dos\nLínea tres\nLínea cuatro")).toEqual([
      "Línea uno",
      "Línea dos",
      "Línea tres",
    ]);
  });

  test("strips bracket and markdown decoration", () => {
    expect(extractMealLabels("DESAYUNO:\n[Mote pillo]\n## ALMUERZO:\n# Fanesca")).toEqual(["Mote pillo", "Fanesca"]);
  });

  test("a header followed directly by another header yields no label", () => {
    expect(extractMealLabels("DESAYUNO:\nALMUERZO:\nCeviche de camarón")).toEqual(["Ceviche de camarón"]);
  });

  test("labels are capped at 120 characters", () => {
    const [label] = extractMealLabels(`ALMUERZO:\n${"a".repeat(200)}`);
    expect(label).toHaveLength(120);
  });
});

describe("composeMessage", () => {
  test("html format escapes the plan under a bold header", () => {
    expect(composeMessage("Arroz <con> menestra & carne\n", MONDAY, { timeZone: "UTC", format: "html" })).toBe(
      "🇪🇨 <b>Plan de Comidas Ecuatorianas</b>\n📅 Monday, October 19, 2026\n\nArroz &lt;con&gt; menestra &amp; carne"
    );
  });

  test("plain format has no markup", () => {
    expect(composeMessage("Arroz <con> menestra", MONDAY, { timeZone: "UTC", format: "plain" })).toBe(
      "🇪🇨 Plan de Comidas Ecuatorianas\n📅 Monday, October 19, 2026\n\nArroz <con> menestra"
    );
  });

  test("escapeHtml", () => {
    expect(escapeHtml("a & b < c > d")).toBe("a &amp; b &lt; c &gt; d");
  });
});
