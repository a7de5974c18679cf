import assert from "node:assert/strict";
import { Server } from "node:http";
import test from "node:test";
import express from "express";
import { ConfigurationError } from "../errors.js";
import { MockTransformer, OpenAiCompatibleTransformer, ProviderRegistry, mockVerdictText } from "../providers.js";

test("ProviderRegistry resolves deterministic default provider", async (t) => {
  await t.test("falls back to mock when no real providers are configured", () => {
    const registry = new ProviderRegistry({ env: {} });
    assert.equal(registry.getDefaultProviderId(), "mock");
    assert.equal(registry.list()[0]?.id, "mock");
    assert.equal(registry.resolveProviderId(undefined), "mock");
    assert.equal(registry.get().descriptor.id, "mock");
  });

  await t.test("prefers first configured real provider when no override is set", () => {
    const registry = new ProviderRegistry({ env: { OPENAI_API_KEY: "test-openai-key", OPENAI_MODEL: "gpt-test" } });
    assert.equal(registry.getDefaultProviderId(), "openai");
    assert.equal(registry.list()[0]?.id, "openai");
    assert.equal(registry.list()[0]?.defaultModel, "gpt-test");
    assert.equal(registry.resolveProviderId(undefined), "openai");
    assert.equal(registry.resolveProviderId("mock"), "mock");
  });

  await t.test("honors explicit default override when configured provider exists", () => {
    const registry = new ProviderRegistry({
      env: {
        OPENAI_API_KEY: "test-openai-key",
        OPENROUTER_API_KEY: "test-openrouter-key",
        ARCH_REPAIR_DEFAULT_PROVIDER: "openrouter"
      }
    });
    assert.equal(registry.getDefaultProviderId(), "openrouter");
    assert.deepEqual(
      registry.list().map((descriptor) => descriptor.id),
      ["openrouter", "mock", "openai"]
    );
  });

  await t.test("throws when explicit default override points to unknown provider", () => {
    assert.throws(
      () => new ProviderRegistry({ env: { ARCH_REPAIR_DEFAULT_PROVIDER: "openai" } }),
      /ARCH_REPAIR_DEFAULT_PROVIDER is set to 'openai', but that provider is not configured\./
    );
  });

  await t.test("rejects unknown provider ids", () => {
    const registry = new ProviderRegistry({ env: {} });
    assert.throws(() => registry.get("unknown-provider"), ConfigurationError);
  });
});

test("MockTransformer answers with a clean verdict", async () => {
  const mock = new MockTransformer();
  assert.deepEqual(await mock.generate({ messages: [] }), { ok: true, text: mockVerdictText });

  const controller = new AbortController();
  controller.abort();
  assert.deepEqual(await mock.generate({ messages: [], signal: controller.signal }), {
    ok: false,
    reason: "request aborted"
  });
});

test("OpenAiCompatibleTransformer reads chat completions", async (t) => {
  const received: unknown[] = [];
  const app = express();
  app.use(express.json());
  app.post("/v1/chat/completions", (req, res) => {
    received.push(req.body);
    if (req.get("Authorization") !== "Bearer test-secret") {
      res.status(401).send("bad key");
      return;
    }
    res.json({ choices: [{ message: { content: '{"violation":false,"reason":"ok","fix":""}' } }] });
  });

  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
  });
  t.after(() => new Promise<void>((resolve) => server.close(() => resolve())));

  const address = server.address();
  assert.ok(address && typeof address !== "string");
  const baseUrl = `http://127.0.0.1:${address.port}/v1/`;
  const descriptor = { id: "openai", name: "OpenAI", defaultModel: "gpt-test", configured: true };

  const transformer = new OpenAiCompatibleTransformer(descriptor, "test-secret", baseUrl, 5_000);
  assert.deepEqual(await transformer.generate({ messages: [{ role: "user", content: "review" }] }), {
    ok: true,
    text: '{"violation":false,"reason":"ok","fix":""}'
  });
  assert.deepEqual(received[0], {
    model: "gpt-test",
    temperature: 0.2,
    response_format: { type: "json_object" },
    messages: [{ role: "user", content: "review" }]
  });

  const rejected = new OpenAiCompatibleTransformer(descriptor, "wrong-key", baseUrl, 5_000);
  assert.deepEqual(await rejected.generate({ messages: [] }), {
    ok: false,
    reason: "provider request failed (401): bad key"
  });
});
