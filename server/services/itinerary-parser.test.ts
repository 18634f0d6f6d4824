import { describe, it, expect } from "vitest";
import {
  extractCost,
  extractDuration,
  extractPlace,
  NO_CHANGE,
  parseItineraryResponse,
  parseModificationIntent,
  repairTruncatedJson,
} from "./itinerary-parser";

describe("extractCost", () => {
  it("reads rupee amounts with separators", () => {
    expect(extractCost("Entry ₹1,250 per person")).toBe(1250);
    expect(extractCost("Rs. 800 for the ferry")).toBe(800);
    expect(extractCost("INR 300")).toBe(300);
  });

  it("is zero when no amount is given", () => {
    expect(extractCost("free entry")).toBe(0);
  });
});

describe("extractDuration", () => {
  it("normalises hours and minutes", () => {
    expect(extractDuration("about 2.5 hours")).toBe("2.5 hours");
    expect(extractDuration("45 mins")).toBe("45 minutes");
    expect(extractDuration("1 hr")).toBe("1 hour");
  });

  it("defaults to one hour", () => {
    expect(extractDuration("all day")).toBe("1 hour");
  });
});

describe("extractPlace", () => {
  it("reads labelled and mentioned places", () => {
    expect(extractPlace("Location: Palolem Beach, South Goa")).toBe("Palolem Beach");
    expect(extractPlace("Lunch at Britto's - 90 minutes")).toBe("Britto's");
    expect(extractPlace("Visit Fort Aguada - 2 hours")).toBe("Fort Aguada");
    expect(extractPlace("Shopping in the Anjuna Flea Market")).toBe("Anjuna Flea Market");
  });

  it("ignores lower-case mentions", () => {
    expect(extractPlace("Check in at hotel")).toBeUndefined();
  });
});

describe("parseItineraryResponse", () => {
  it("parses fenced JSON and coerces costs and kinds", () => {
    const text = [
      "```json",
      '{"days":[{"day":1,"activities":[{"time":"9:00 AM","title":"Baga Beach walk","location":"Baga Beach","estimatedCost":"₹1,200","duration":"2 hours","kind":"Activity"}]}]}',
      "```",
    ].join("\n");

    expect(parseItineraryResponse(text)).toEqual([
      {
        activities: [
          {
            time: "9:00 AM",
            title: "Baga Beach walk",
            location: "Baga Beach",
            details: undefined,
            estimatedCost: 1200,
            duration: "2 hours",
            kind: "activity",
          },
        ],
      },
    ]);
  });

  it("accepts alternative field names", () => {
    const text = '{"daily_plans":[{"activities":[{"activity":"Lunch","place":"Fisherman\'s Wharf","cost":450,"kind":"meal"}]}]}';
    const [day] = parseItineraryResponse(text);
    expect(day.activities[0]).toMatchObject({
      time: "TBD",
      title: "Lunch",
      location: "Fisherman's Wharf",
      estimatedCost: 450,
      duration: "1 hour",
      kind: "meal",
    });
  });

  it("keeps the complete days of a truncated response", () => {
    const text =
      '{"days":[{"day":1,"activities":[{"time":"9:00 AM","title":"Fort visit","estimatedCost":100}]},' +
      '{"day":2,"activities":[{"time":"9:00 AM","tit';

    const days = parseItineraryResponse(text);
    expect(days).toHaveLength(1);
    expect(days[0].activities[0].title).toBe("Fort visit");
    expect(days[0].activities[0].estimatedCost).toBe(100);
  });

  it("drops activities without a title and days without activities", () => {
    const text = '{"days":[{"activities":[{"time":"9:00 AM"}]},{"activities":[{"title":"Sunset cruise"}]}]}';
    const days = parseItineraryResponse(text);
    expect(days).toHaveLength(1);
    expect(days[0].activities[0].title).toBe("Sunset cruise");
  });

  it("falls back to the Day N text format", () => {
    const text = [
      "Day 1: Arrival",
      "9:00 AM: Check in at hotel - 1 hour - ₹2,000",
      "Leave bags and freshen up",
      "1:00 PM: Lunch at Britto's - 90 minutes - Rs. 800",
      "",
      "Day 2:",
      "Morning: Dudhsagar Falls trek - 5 hrs - ₹1500",
    ].join("\n");

    expect(parseItineraryResponse(text)).toEqual([
      {
        activities: [
          {
            time: "9:00 AM",
            title: "Check in at hotel",
            estimatedCost: 2000,
            duration: "1 hour",
            kind: "activity",
            details: "Leave bags and freshen up",
          },
          {
            time: "1:00 PM",
            title: "Lunch at Britto's",
            location: "Britto's",
            estimatedCost: 800,
            duration: "90 minutes",
            kind: "activity",
          },
        ],
      },
      {
        activities: [
          {
            time: "Morning",
            title: "Dudhsagar Falls trek",
            location: "Dudhsagar Falls",
            estimatedCost: 1500,
            duration: "5 hours",
            kind: "activity",
          },
        ],
      },
    ]);
  });

  it("takes cost and place from follow-up lines when the activity line has none", () => {
    const text = "Day 1:\n9:00 AM: Visit Fort Aguada - 2 hours\nEntry fee ₹500, hire a scooter at Candolim";

    expect(parseItineraryResponse(text)).toEqual([
      {
        activities: [
          {
            time: "9:00 AM",
            title: "Visit Fort Aguada",
            location: "Fort Aguada",
            details: "Entry fee ₹500, hire a scooter at Candolim",
            estimatedCost: 500,
            duration: "2 hours",
            kind: "activity",
          },
        ],
      },
    ]);
  });

  it("keeps the first cost and place it finds", () => {
    const text = [
      "Day 1:",
      "4:00 PM: Sunset swim - 1 hour - ₹0",
      "Location: Palolem Beach",
      "Snacks Rs. 300",
      "6:00 PM: Dinner at Martin's Corner - ₹1,800",
      "Ask for the table near Colva Beach, around ₹2,500 for two",
    ].join("\n");

    const [day] = parseItineraryResponse(text);
    expect(day.activities[0]).toMatchObject({ location: "Palolem Beach", estimatedCost: 300 });
    expect(day.activities[1]).toMatchObject({ location: "Martin's Corner", estimatedCost: 1800 });
  });

  it("returns nothing for a refusal", () => {
    expect(parseItineraryResponse("Sorry, I cannot help with that.")).toEqual([]);
  });
});

describe("repairTruncatedJson", () => {
  it("closes the array after the last complete object", () => {
    expect(repairTruncatedJson('{"days":[{"a":"}"},{"b":1},{"c":')).toEqual({ days: [{ a: "}" }, { b: 1 }] });
  });

  it("gives up when no object is complete", () => {
    expect(repairTruncatedJson('{"days":[{"a":')).toBeNull();
  });
});

describe("parseModificationIntent", () => {
  it("reads the three fields", () => {
    const text = "BUDGET_ADJUSTMENT: increase\nACCOMMODATION_PREFERENCE: luxury\nNEW_THEMES: Food, nightlife";
    expect(parseModificationIntent(text)).toEqual({
      budgetAdjustment: "increase",
      accommodation: "luxury",
      newThemes: ["Food", "Nightlife"],
    });
  });

  it("tolerates markdown, extra words and unknown themes", () => {
    const text = [
      "Here is my analysis:",
      "1. **BUDGET_ADJUSTMENT**: Decrease by about 20%",
      "- Accommodation Preference: budget",
      "NEW_THEMES: Beaches, Food, food",
    ].join("\n");
    expect(parseModificationIntent(text)).toEqual({
      budgetAdjustment: "decrease",
      accommodation: "budget",
      newThemes: ["Food"],
    });
  });

  it("is no change when nothing usable is given", () => {
    expect(parseModificationIntent("BUDGET_ADJUSTMENT: maintain\nNEW_THEMES: none")).toEqual(NO_CHANGE);
    expect(parseModificationIntent("I cannot tell.")).toEqual(NO_CHANGE);
  });
});
