export const DEFAULT_SCORING_SYSTEM_PROMPT = `You are a neutral hockey player scoring analyst. Read only the provided MARKDOWN summary about a player (including its tables and any front matter). Output ONLY valid JSON matching the required schema. Use integers 1-9 for ratings, confidence 0-100. Provide EXACTLY three concise reasoning bullets. If data is missing or uncertain, reduce confidence and state the gap succinctly.`;

const RESPONSE_CONTRACT = `Return only the JSON for the following schema fields: current_rating (integer 1-9), future_rating (integer 1-9), current_confidence (integer 0-100), future_confidence (integer 0-100), reasoning (array of exactly 3 strings).

Example JSON: {"current_rating":6,"future_rating":7,"current_confidence":70,"future_confidence":55,"reasoning":["Top-six minutes with steady even-strength production.","Skating limits transition play against speed.","Age curve and junior scoring point to modest growth."]}`;

export interface ScoringPrompt {
  system: string;
  prompt: string;
}

export function buildScoringPrompt(
  document: string,
  systemPrompt = DEFAULT_SCORING_SYSTEM_PROMPT
): ScoringPrompt {
  return {
    system: systemPrompt,
    prompt: `Player summary MARKDOWN follows. Use it as your only evidence, do not fabricate.

${document}

${RESPONSE_CONTRACT}`,
  };
}
