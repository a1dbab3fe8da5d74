import { GoogleGenAI } from "@google/genai";

/** Sends one prompt and resolves with the model's text reply. */
export type TextModel = (prompt: string) => Promise<string>;

export function createGeminiModel(apiKey: string, model: string): TextModel {
	const client = new GoogleGenAI({ apiKey });

	return async (prompt) => {
		const response = await client.models.generateContent({
			model,
			contents: prompt,
			config: {
				responseMimeType: "application/json",
				temperature: 0.2,
			},
		});
		return response.text ?? "";
	};
}
