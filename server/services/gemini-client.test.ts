import { describe, it, expect, vi } from "vitest";
import type { GenerateContentParameters, GoogleGenAIOptions } from "@google/genai";
import type { GeminiConfig } from "../config";
import { ServiceNotConfiguredError, UpstreamServiceError } from "../errors";
import { GeminiTextModel, type ContentClient } from "./gemini-client";

const baseConfig: GeminiConfig = {
  apiKey: "test-secret",
  location: "us-central1",
  models: ["model-a", "model-b"],
};

const notFound = () => Object.assign(new Error("models/model-a is not found"), { status: 404 });

function fakeClient() {
  const generateContent = vi.fn<(params: GenerateContentParameters) => Promise<{ text?: string }>>();
  const client: ContentClient = { models: { generateContent } };
  const createClient = vi.fn<(options: GoogleGenAIOptions) => ContentClient>(() => client);
  return { generateContent, createClient };
}

describe("GeminiTextModel", () => {
  it("sends the prompt with generation settings", async () => {
    const { generateContent, createClient } = fakeClient();
    generateContent.mockResolvedValueOnce({ text: '{"days":[]}' });
    const model = new GeminiTextModel(baseConfig, createClient);

    await expect(model.generateText("plan Goa", { json: true })).resolves.toBe('{"days":[]}');

    expect(createClient).toHaveBeenCalledWith({ apiKey: "test-secret" });
    const [params] = generateContent.mock.calls[0];
    expect(params.model).toBe("model-a");
    expect(params.contents).toEqual([{ role: "user", parts: [{ text: "plan Goa" }] }]);
    expect(params.config).toMatchObject({
      candidateCount: 1,
      temperature: 0.7,
      topP: 0.8,
      topK: 40,
      maxOutputTokens: 8192,
      responseMimeType: "application/json",
    });
  });

  it("uses Vertex AI when only a project is configured", async () => {
    const { generateContent, createClient } = fakeClient();
    generateContent.mockResolvedValueOnce({ text: "ok" });
    const model = new GeminiTextModel(
      { project: "test-project", location: "asia-south1", credentialsPath: "/tmp/sa.json", models: ["model-a"] },
      createClient,
    );

    await model.generateText("hello");

    expect(createClient).toHaveBeenCalledWith({
      vertexai: true,
      project: "test-project",
      location: "asia-south1",
      googleAuthOptions: { keyFilename: "/tmp/sa.json" },
    });
  });

  it("skips models the endpoint does not know and remembers the working one", async () => {
    const { generateContent, createClient } = fakeClient();
    generateContent
      .mockRejectedValueOnce(notFound())
      .mockResolvedValueOnce({ text: "first" })
      .mockResolvedValueOnce({ text: "second" });
    const model = new GeminiTextModel(baseConfig, createClient);

    await expect(model.generateText("one")).resolves.toBe("first");
    expect(model.activeModel).toBe("model-b");
    await expect(model.generateText("two")).resolves.toBe("second");

    expect(generateContent.mock.calls.map(([params]) => params.model)).toEqual(["model-a", "model-b", "model-b"]);
    expect(createClient).toHaveBeenCalledTimes(1);
  });

  it("fails when no configured model is available", async () => {
    const { generateContent, createClient } = fakeClient();
    generateContent.mockRejectedValue(notFound());
    const model = new GeminiTextModel(baseConfig, createClient);

    await expect(model.generateText("hello")).rejects.toThrow(
      "Gemini: none of the configured models is available (model-a, model-b)",
    );
  });

  it("treats an empty answer as an upstream failure", async () => {
    const { generateContent, createClient } = fakeClient();
    generateContent.mockResolvedValueOnce({ text: "  " });
    const model = new GeminiTextModel(baseConfig, createClient);

    const error = await model.generateText("hello").catch((e: unknown) => e);
    expect(error).toBeInstanceOf(UpstreamServiceError);
    expect(error).toMatchObject({ message: "Gemini: empty response from model-a" });
  });

  it("wraps other failures without trying further models", async () => {
    const { generateContent, createClient } = fakeClient();
    generateContent.mockRejectedValueOnce(new Error("quota exceeded"));
    const model = new GeminiTextModel(baseConfig, createClient);

    await expect(model.generateText("hello")).rejects.toThrow("Gemini: quota exceeded");
    expect(generateContent).toHaveBeenCalledTimes(1);
  });

  it("refuses to run without credentials", async () => {
    const { createClient } = fakeClient();
    const model = new GeminiTextModel({ location: "us-central1", models: ["model-a"] }, createClient);

    expect(model.isConfigured()).toBe(false);
    await expect(model.generateText("hello")).rejects.toBeInstanceOf(ServiceNotConfiguredError);
    expect(createClient).not.toHaveBeenCalled();
  });
});
