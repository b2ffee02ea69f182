import { describe, it, expect } from "vitest";
import path from "path";
import { loadConfig } from "../../src/config/config";

describe("Config", () => {
  it("debe tener valores por defecto", () => {
    expect(loadConfig({})).toEqual({
      HOST_VERSION: "1.20.4",
      LEGACY_MODE: false,
      INSTALLATION_KEY: "CatalogCompat",
      SUB_TYPE_EXEMPT_TYPES: ["BOW"],
      LOG_LEVEL: "info",
      LOG_TO_FILE: false,
      LOG_DIR: path.join(process.cwd(), "logs"),
    });
  });

  it("debe derivar el modo legacy de la versión", () => {
    expect(loadConfig({ HOST_VERSION: "1.12.2" }).LEGACY_MODE).toBe(true);
    expect(loadConfig({ HOST_VERSION: "1.13.2" }).LEGACY_MODE).toBe(false);
  });

  it("debe permitir forzar el modo legacy", () => {
    const config = loadConfig({ HOST_VERSION: "1.12.2", LEGACY_MODE: "false" });
    expect(config.LEGACY_MODE).toBe(false);
  });

  it("debe rechazar valores booleanos inválidos", () => {
    expect(() => loadConfig({ LEGACY_MODE: "maybe" })).toThrow(
      "Invalid HOST_VERSION/LEGACY_MODE: LEGACY_MODE must be 'true' or 'false', got 'maybe'",
    );
  });

  it("debe rechazar versiones irreconocibles", () => {
    expect(() => loadConfig({ HOST_VERSION: "latest" })).toThrow(
      "Invalid HOST_VERSION/LEGACY_MODE: Unrecognized host version 'latest'",
    );
  });

  it("debe rechazar una clave de instalación vacía", () => {
    expect(() => loadConfig({ INSTALLATION_KEY: "   " })).toThrow(
      "INSTALLATION_KEY must not be empty",
    );
  });

  it("debe leer la lista de tipos exentos", () => {
    const config = loadConfig({ SUB_TYPE_EXEMPT_TYPES: " bow , fishing_rod," });
    expect(config.SUB_TYPE_EXEMPT_TYPES).toEqual(["BOW", "FISHING_ROD"]);
  });

  it("debe validar el nivel de log", () => {
    expect(loadConfig({ LOG_LEVEL: "DEBUG" }).LOG_LEVEL).toBe("debug");
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow(
      "LOG_LEVEL must be one of debug, info, warn, error, got 'verbose'",
    );
  });

  it("debe leer la salida a fichero del log", () => {
    const config = loadConfig({ LOG_TO_FILE: "TRUE", LOG_DIR: "tmp/logs" });
    expect(config.LOG_TO_FILE).toBe(true);
    expect(config.LOG_DIR).toBe(path.resolve("tmp/logs"));
  });

  it("debe rechazar LOG_TO_FILE inválido", () => {
    expect(() => loadConfig({ LOG_TO_FILE: "yes", LOG_DIR: "/x" })).toThrow(
      "LOG_TO_FILE must be 'true' or 'false', got 'yes'",
    );
  });
});
