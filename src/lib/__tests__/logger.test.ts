import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { Logger } from "../logger";

describe("Logger", () => {
  it("mascara chaves sensíveis", () => {
    const logger = new Logger({ NODE_ENV: "development" });
    assert.deepEqual(logger.sanitizeContext({ password: "x", apiKey: "y", user: "ana" }), {
      password: "***REDACTED***",
      apiKey: "***REDACTED***",
      user: "ana",
    });
  });

  it("formata nível, mensagem e contexto", (t) => {
    const log = t.mock.method(console, "log", () => undefined);
    new Logger({ NODE_ENV: "production" }).info("carregado", { n: 1 });

    assert.equal(log.mock.calls.length, 1);
    assert.match(String(log.mock.calls[0].arguments[0]), /^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[INFO\] carregado \{"n":1\}$/);
  });

  it("debug só fora de produção", (t) => {
    const log = t.mock.method(console, "log", () => undefined);
    new Logger({ NODE_ENV: "production" }).debug("detalhe");
    new Logger({ NODE_ENV: "development" }).debug("detalhe");
    assert.equal(log.mock.calls.length, 1);
  });

  it("LOG_LEVEL corta níveis abaixo do configurado", (t) => {
    const log = t.mock.method(console, "log", () => undefined);
    const warn = t.mock.method(console, "warn", () => undefined);
    const logger = new Logger({ NODE_ENV: "production", LOG_LEVEL: "warn" });

    logger.info("ignorado");
    logger.warn("atenção");

    assert.equal(log.mock.calls.length, 0);
    assert.equal(warn.mock.calls.length, 1);
  });

  it("silencioso em teste", (t) => {
    const error = t.mock.method(console, "error", () => undefined);
    new Logger({ NODE_ENV: "test" }).error("falha", new Error("x"));
    assert.equal(error.mock.calls.length, 0);
  });
});
