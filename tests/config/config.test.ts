import { describe, it, expect, afterEach, vi } from "vitest";
import { DEFAULT_LEDGER_CONFIG, readPositiveInt } from "../../src/config/config";

describe("Config", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  describe("readPositiveInt", () => {
    it("debe usar el valor por defecto si falta o está vacío", () => {
      expect(readPositiveInt(undefined, 8080)).toBe(8080);
      expect(readPositiveInt("  ", 8080)).toBe(8080);
    });

    it("debe ignorar valores no enteros o no positivos", () => {
      expect(readPositiveInt("abc", 5)).toBe(5);
      expect(readPositiveInt("1.5", 5)).toBe(5);
      expect(readPositiveInt("0", 5)).toBe(5);
      expect(readPositiveInt("-3", 5)).toBe(5);
    });

    it("debe leer enteros positivos", () => {
      expect(readPositiveInt("3000", 8080)).toBe(3000);
    });
  });

  it("debe tener valores por defecto del ledger", () => {
    expect(DEFAULT_LEDGER_CONFIG).toEqual({
      administrator: "admin",
      globalCap: 1_000_000_000,
      requestExpirationBlocks: 144,
      priceHistoryCapacity: 10,
    });
  });

  it("debe usar valores de entorno cuando están disponibles", async () => {
    vi.stubEnv("PORT", "3000");
    vi.stubEnv("LEDGER_ADMIN", "treasury");
    vi.stubEnv("GLOBAL_CAP", "500");
    vi.stubEnv("REQUEST_EXPIRATION_BLOCKS", "12");
    vi.stubEnv("PRICE_HISTORY_CAPACITY", "not-a-number");
    vi.stubEnv("ALLOWED_ORIGINS", "http://a.test,http://b.test");

    vi.resetModules();
    const { CONFIG } = await import("../../src/config/config");

    expect(CONFIG.PORT).toBe(3000);
    expect(CONFIG.ALLOWED_ORIGINS).toEqual(["http://a.test", "http://b.test"]);
    expect(CONFIG.LEDGER).toEqual({
      administrator: "treasury",
      globalCap: 500,
      requestExpirationBlocks: 12,
      priceHistoryCapacity: 10,
    });
  });
});
