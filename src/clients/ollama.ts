import axios, { type AxiosInstance } from "axios";
import type { LlmBackend } from "../types";
import { logger } from "../utils/logger";

const HEALTH_TIMEOUT_MS = 5_000;

export class OllamaClient implements LlmBackend {
	private readonly http: AxiosInstance;

	constructor(baseUrl: string) {
		this.http = axios.create({ baseURL: baseUrl });
	}

	async healthCheck(): Promise<boolean> {
		try {
			const res = await this.http.get("/api/tags", {
				timeout: HEALTH_TIMEOUT_MS,
			});
			return res.status === 200;
		} catch (err) {
			logger.warn(
				{ baseUrl: this.http.defaults.baseURL, error: String(err) },
				"Cannot reach Ollama",
			);
			return false;
		}
	}

	async generate(
		prompt: string,
		model: string,
		signal?: AbortSignal,
	): Promise<string> {
		const res = await this.http.post<unknown>(
			"/api/generate",
			{
				model,
				prompt,
				stream: false,
				options: { temperature: 0.3, num_predict: 1000 },
			},
			{ signal },
		);

		const data = res.data;
		if (
			!data ||
			typeof data !== "object" ||
			!("response" in data) ||
			typeof data.response !== "string"
		) {
			throw new Error("Ollama response has no text");
		}
		return data.response;
	}
}
