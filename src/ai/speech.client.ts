import fetch from "node-fetch";
import FormData from "form-data";

interface TranscriptionResponse {
  text?: string;
}

export interface SpeechClientConfig {
  apiKey: string;
  baseUrl?: string;
  transcriptionModel: string;
  ttsModel: string;
  ttsVoice: string;
}

export class SpeechClient {
  private readonly baseUrl: string;

  constructor(private readonly config: SpeechClientConfig) {
    this.baseUrl = (config.baseUrl ?? "https://api.openai.com/v1").replace(/\/+$/, "");
  }

  async transcribe(buffer: Buffer, fileName = "voice.ogg", contentType = "audio/ogg"): Promise<string> {
    const form = new FormData();
    form.append("model", this.config.transcriptionModel);
    form.append("file", buffer, {
      filename: fileName,
      contentType,
    });

    const response = await fetch(`${this.baseUrl}/audio/transcriptions`, {
      method: "POST",
      headers: {
        authorization: `Bearer ${this.config.apiKey}`,
        ...form.getHeaders(),
      },
      body: form,
    });

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`Transcription API error: HTTP ${response.status} - ${body}`);
    }

    const body = (await response.json()) as TranscriptionResponse;
    const text = typeof body.text === "string" ? body.text.trim() : "";
    if (!text) {
      throw new Error("Transcription returned empty text.");
    }

    return text;
  }

  async synthesize(text: string): Promise<Buffer> {
    const response = await fetch(`${this.baseUrl}/audio/speech`, {
      method: "POST",
      headers: {
        authorization: `Bearer ${this.config.apiKey}`,
        "content-type": "application/json",
      },
      body: JSON.stringify({
        model: this.config.ttsModel,
        voice: this.config.ttsVoice,
        input: text,
        response_format: "mp3",
      }),
    });

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`Speech API error: HTTP ${response.status} - ${body}`);
    }

    return response.buffer();
  }
}
