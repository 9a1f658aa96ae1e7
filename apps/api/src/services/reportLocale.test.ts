import { describe, expect, it } from "vitest";

import { sampleContext } from "../testing/fixtures.js";
import { narrativeFacts } from "./reportGenerator.js";
import { getReportStrings } from "./reportLocale.js";

describe("getReportStrings", () => {
  it("titles the offline suitability section with the locale heading", () => {
    expect(getReportStrings("en").narrative.suitability(narrativeFacts(sampleContext, "en"))).toBe(
      '<div class="section"><h2>6) Position Fit Assessment</h2><p class="fit">Position Fit: 85%</p>' +
        "<p>The fit percentage follows the evaluated score of 85.</p></div>"
    );
    expect(getReportStrings("tr").narrative.suitability(narrativeFacts(sampleContext, "tr"))).toBe(
      '<div class="section"><h2>6) Pozisyona Uygunluk Değerlendirmesi</h2><p class="fit">Pozisyona Uygunluk: %85</p>' +
        "<p>Uygunluk yüzdesi 85 değerlendirme skorunu izler.</p></div>"
    );
  });

  it.each(["en", "tr"] as const)("asks the model for a section under the %s heading", (locale) => {
    const strings = getReportStrings(locale);
    expect(strings.prompt.suitability[0]("85")).toContain(`<h2>${strings.headings.suitability}</h2>`);
  });
});
