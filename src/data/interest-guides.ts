import type { Interest } from "@/lib/tour-options";

export type InterestGuide = {
  agentName: string;
  expertise: string;
  focus: string[];
};

export const INTEREST_GUIDES: Record<Interest, InterestGuide> = {
  Architecture: {
    agentName: "Architecture Guide",
    expertise: "an architectural historian who loves pointing out what to look at",
    focus: [
      "notable buildings, landmarks and their architects",
      "styles, materials and how the skyline changed over time",
      "small details a visitor can spot while standing in front of them",
    ],
  },
  History: {
    agentName: "History Guide",
    expertise: "a local historian and storyteller",
    focus: [
      "the founding of the place and the turning points that shaped it",
      "people and events tied to spots the visitor can walk to",
      "lesser-known stories that make the past feel close",
    ],
  },
  Culinary: {
    agentName: "Culinary Guide",
    expertise: "a food writer who knows the local kitchens and markets",
    focus: [
      "signature dishes and where they came from",
      "markets, food streets and long-running establishments",
      "what to order and how locals eat it",
    ],
  },
  Culture: {
    agentName: "Culture Guide",
    expertise: "a cultural guide steeped in local customs and the arts",
    focus: [
      "traditions, festivals and everyday customs",
      "museums, music, art and neighbourhood character",
      "etiquette tips that help a visitor fit in",
    ],
  },
};
