import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { Logger, LogCategory, LogLevel } from "../../src/infrastructure/utils/logger";

describe("Logger", () => {
  let log: Logger;

  beforeEach(() => {
    log = new Logger({ toFile: false, consoleLevel: LogLevel.ERROR });
  });

  afterEach(() => {
    log.destroy();
    vi.restoreAllMocks();
  });

  it("debe guardar todos los niveles en memoria", () => {
    log.debug("debug entry", LogCategory.POOL);
    log.info("info entry");
    log.warn("warn entry", LogCategory.CONTROL, { flag: true });

    const entries = log.getRecentLogs();
    expect(entries.map((entry) => entry.level)).toEqual([
      LogLevel.DEBUG,
      LogLevel.INFO,
      LogLevel.WARN,
    ]);
    expect(entries[1].category).toBe(LogCategory.GENERAL);
    expect(entries[2].data).toEqual({ flag: true });
  });

  it("debe tratar el segundo argumento como datos si no es una categoría", () => {
    log.info("payload entry", { requestId: 3 });

    const [entry] = log.getRecentLogs();
    expect(entry.category).toBe(LogCategory.GENERAL);
    expect(entry.data).toEqual({ requestId: 3 });
  });

  it("debe imprimir en consola solo desde el nivel mínimo", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

    log.info("quiet entry");
    log.error("loud entry", LogCategory.HTTP);

    expect(info).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(1);
  });

  it("debe prefijar los logs de actor", () => {
    log.actorLog(LogLevel.INFO, LogCategory.BALANCES, "alice", "returned 5");

    const [entry] = log.queryLogs({ actorId: "alice" });
    expect(entry.message).toBe("[Actor:alice] returned 5");
    expect(entry.category).toBe(LogCategory.BALANCES);
  });

  it("debe descartar mensajes repetidos dentro de la ventana", () => {
    for (let i = 0; i < 6; i++) {
      log.info("same message");
    }

    expect(log.getBufferSize()).toBe(3);
  });

  it("debe olvidar las claves de throttling pasada la ventana", () => {
    vi.useFakeTimers();
    try {
      vi.setSystemTime(0);
      const windowed = new Logger({
        toFile: false,
        consoleLevel: LogLevel.ERROR,
        throttleWindowMs: 1000,
      });
      for (let i = 0; i < 50; i++) {
        windowed.info(`submitted request ${i}`);
      }
      expect(windowed.getThrottledKeyCount()).toBe(50);

      vi.setSystemTime(2001);
      windowed.info("submitted request 50");

      expect(windowed.getThrottledKeyCount()).toBe(1);
      expect(windowed.getBufferSize()).toBe(51);
    } finally {
      vi.useRealTimers();
    }
  });

  it("debe adjuntar la correlación activa y el bloque", () => {
    log.setBlock(12);
    const correlationId = log.startCorrelation("cmd");
    log.info("inside");
    log.endCorrelation();
    log.info("outside");

    expect(correlationId.startsWith("cmd-")).toBe(true);
    const correlated = log.queryLogs({ correlationId });
    expect(correlated.map((entry) => entry.message)).toEqual(["inside"]);
    expect(correlated[0].block).toBe(12);
    expect(log.queryLogs({ messageContains: "OUTSIDE" })[0].correlationId).toBeUndefined();
  });

  it("debe filtrar por nivel y categoría y limitar resultados", () => {
    log.info("pool one", LogCategory.POOL);
    log.warn("pool two", LogCategory.POOL);
    log.warn("control one", LogCategory.CONTROL);

    expect(
      log.queryLogs({ levels: [LogLevel.WARN], categories: [LogCategory.POOL] }).map(
        (entry) => entry.message,
      ),
    ).toEqual(["pool two"]);
    expect(log.queryLogs({ limit: 1 }).map((entry) => entry.message)).toEqual([
      "control one",
    ]);
  });

  it("debe contar métricas por nivel y categoría", () => {
    log.info("metric one", LogCategory.REQUESTS);
    log.error("metric two", LogCategory.REQUESTS);

    const metrics = log.getMetrics();
    expect(metrics.totalCount).toBe(2);
    expect(metrics.byLevel[LogLevel.ERROR]).toBe(1);
    expect(metrics.byCategory[LogCategory.REQUESTS]).toBe(2);

    log.resetMetrics();
    expect(log.getMetrics().totalCount).toBe(0);
  });

  it("debe escribir JSON Lines al hacer flush", async () => {
    const logDir = fs.mkdtempSync(path.join(os.tmpdir(), "ledger-logs-"));
    const fileLogger = new Logger({
      toFile: true,
      logDir,
      consoleLevel: LogLevel.ERROR,
      writeIntervalMs: 60_000,
    });

    try {
      fileLogger.info("persisted entry", LogCategory.LEDGER);
      await fileLogger.flush();

      const files = fs.readdirSync(logDir);
      expect(files).toHaveLength(1);
      const lines = fs.readFileSync(path.join(logDir, files[0]), "utf-8").trim().split("\n");
      expect(lines).toHaveLength(1);
      expect(JSON.parse(lines[0])).toMatchObject({
        level: LogLevel.INFO,
        category: LogCategory.LEDGER,
        message: "persisted entry",
      });
      expect(fileLogger.getBufferSize()).toBe(0);
    } finally {
      fileLogger.destroy();
      fs.rmSync(logDir, { recursive: true, force: true });
    }
  });
});
