/**
 * Prompt for reading art supplies out of a photo
 */

export const supplyScanPrompt = `List the art supplies you can see in this photo.

Reply with a JSON array only, no prose. One object per distinct item:
{"name": string, "category": string, "brand": string | null, "quantityLevel": "plenty" | "low" | "empty"}

- name: the colour or product name as printed, e.g. "Ultramarine Blue" or "Cold Press Block 9x12"
- category: one of paint, paper, brush, canvas, drawing, medium, tool
- brand: only when the label is readable, otherwise null
- quantityLevel: judge from what is visible (a squeezed-flat tube is "low", an empty pan is "empty"); use "plenty" when you cannot tell

If there are no art supplies in the photo, reply with [].`;
