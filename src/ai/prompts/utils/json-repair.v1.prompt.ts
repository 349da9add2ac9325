export const JSON_REPAIR_V1_PROMPT = `The previous screening answer could not be read as a JSON object.

Rewrite it as one JSON object matching expected_shape.

Rules:
- Keep the original wording of every text value you can recover.
- Keep numbers and labels exactly as they appear in previous_answer.
- Drop greetings, markdown fences and any text outside the object.
- Use an empty string or an empty array for a field you cannot recover.
- Never add facts that are not in previous_answer.

Return the JSON object only.`;

export function buildJsonRepairV1Prompt(input: { schemaHint: string; raw: string }): string {
  const payload = {
    expected_shape: input.schemaHint,
    previous_answer: input.raw,
  };
  return `${JSON_REPAIR_V1_PROMPT}\n\nInput:\n${JSON.stringify(payload, null, 2)}`;
}
