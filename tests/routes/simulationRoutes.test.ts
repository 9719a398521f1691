import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { Server } from "node:http";
import { createApp } from "../../src/application/app";
import {
  MAX_STEP_TICKS,
  parseSimulationCommand,
} from "../../src/application/routes/simulationRoutes";
import { SimulationCommandType } from "../../src/shared/constants/CommandEnums";
import { createTestWarehouse, type TestWarehouse } from "../setup";

describe("parseSimulationCommand", () => {
  it("debe aceptar los tres tipos de comando", () => {
    expect(parseSimulationCommand({ type: "PLACE_ORDER", sku: "SKU-1" })).toEqual({
      type: SimulationCommandType.PLACE_ORDER,
      sku: "SKU-1",
    });
    expect(
      parseSimulationCommand({ type: "ADD_ITEM", sku: "SKU-2", name: "Clips", extra: 1 }),
    ).toEqual({ type: SimulationCommandType.ADD_ITEM, sku: "SKU-2", name: "Clips" });
    expect(parseSimulationCommand({ type: "SET_TIME_SCALE", multiplier: 2.5 })).toEqual({
      type: SimulationCommandType.SET_TIME_SCALE,
      multiplier: 2.5,
    });
  });

  it("debe rechazar cuerpos inválidos", () => {
    expect(parseSimulationCommand(null)).toBeNull();
    expect(parseSimulationCommand("PLACE_ORDER")).toBeNull();
    expect(parseSimulationCommand({ sku: "SKU-1" })).toBeNull();
    expect(parseSimulationCommand({ type: "SELF_DESTRUCT" })).toBeNull();
    expect(parseSimulationCommand({ type: "PLACE_ORDER", sku: "  " })).toBeNull();
    expect(parseSimulationCommand({ type: "ADD_ITEM", sku: "SKU-2" })).toBeNull();
    expect(
      parseSimulationCommand({ type: "SET_TIME_SCALE", multiplier: "2" }),
    ).toBeNull();
    expect(
      parseSimulationCommand({ type: "SET_TIME_SCALE", multiplier: Number.NaN }),
    ).toBeNull();
  });
});

describe("SimulationRoutes", () => {
  let warehouse: TestWarehouse;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    warehouse = createTestWarehouse({ fleetSize: 1, shelfCount: 1 });
    warehouse.runner.initialize();
    const app = createApp({
      runner: warehouse.runner,
      pathfinder: warehouse.pathfinder,
    });
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, () => resolve(listening));
    });
    const address = server.address();
    if (!address || typeof address === "string") {
      throw new Error("expected a TCP address");
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  });

  function post(path: string, body: unknown) {
    return fetch(`${baseUrl}${path}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });
  }

  describe("GET", () => {
    it("debe responder al health check global", async () => {
      const response = await fetch(`${baseUrl}/health`);

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({ status: "ok" });
    });

    it("debe responder al health check de la simulación", async () => {
      warehouse.runner.step(3);

      const response = await fetch(`${baseUrl}/api/sim/health`);

      expect(await response.json()).toEqual({ status: "ok", tick: 3 });
    });

    it("debe devolver el snapshot del estado", async () => {
      const response = await fetch(`${baseUrl}/api/sim/state`);

      expect(response.status).toBe(200);
      expect(await response.json()).toMatchObject({
        tick: 0,
        fleet: { available: [0] },
        grid: { parkedShelves: [{ x: 10, y: 5 }] },
      });
    });

    it("debe devolver 404 en rutas desconocidas", async () => {
      const response = await fetch(`${baseUrl}/api/sim/nope`);

      expect(response.status).toBe(404);
      expect(await response.json()).toEqual({ error: "Route not found" });
    });
  });

  describe("POST /api/sim/orders", () => {
    it("debe programar la orden y devolver su id", async () => {
      const response = await post("/api/sim/orders", { sku: "SKU-1001" });

      expect(response.status).toBe(201);
      expect(await response.json()).toEqual({
        status: "queued",
        eventId: expect.any(String),
      });
      expect(warehouse.driver.pendingCount()).toBe(1);
    });

    it("debe devolver 400 sin sku", async () => {
      const response = await post("/api/sim/orders", {});

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({ error: "Missing sku" });
    });

    it("debe devolver 404 con un sku desconocido", async () => {
      const response = await post("/api/sim/orders", { sku: "SKU-0000" });

      expect(response.status).toBe(404);
      expect(await response.json()).toEqual({ error: "Unknown sku SKU-0000" });
    });

    it("debe devolver 400 con JSON mal formado", async () => {
      const response = await fetch(`${baseUrl}/api/sim/orders`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: "{ sku: ",
      });

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({ error: "Malformed JSON body" });
    });
  });

  describe("POST /api/sim/command", () => {
    it("debe encolar un comando válido", async () => {
      const response = await post("/api/sim/command", {
        type: "SET_TIME_SCALE",
        multiplier: 3,
      });

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({ status: "queued" });
      expect(warehouse.runner.getQueuedCommandCount()).toBe(1);
    });

    it("debe devolver 400 con un comando inválido", async () => {
      const response = await post("/api/sim/command", { type: "PLACE_ORDER" });

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({ error: "Invalid command format" });
    });

    it("debe devolver 429 con la cola llena", async () => {
      for (let i = 0; i < 5; i++) {
        warehouse.runner.enqueueCommand({
          type: SimulationCommandType.SET_TIME_SCALE,
          multiplier: 1,
        });
      }

      const response = await post("/api/sim/command", {
        type: "SET_TIME_SCALE",
        multiplier: 2,
      });

      expect(response.status).toBe(429);
      expect(await response.json()).toEqual({ error: "Command queue full" });
    });
  });

  describe("POST /api/sim/step", () => {
    it("debe avanzar un tick por defecto", async () => {
      const response = await post("/api/sim/step", {});

      expect(response.status).toBe(200);
      expect(await response.json()).toMatchObject({ tick: 1 });
    });

    it("debe avanzar los ticks pedidos", async () => {
      await post("/api/sim/orders", { sku: "SKU-1001" });

      const response = await post("/api/sim/step", { ticks: 64 });

      expect(await response.json()).toMatchObject({
        tick: 64,
        pickCount: 1,
        completedOrders: [{ sku: "SKU-1001", createdAt: 0, completedAt: 64 }],
      });
    });

    it("debe rechazar ticks fuera de rango", async () => {
      for (const ticks of [0, 1.5, MAX_STEP_TICKS + 1, "5"]) {
        const response = await post("/api/sim/step", { ticks });

        expect(response.status).toBe(400);
        expect(await response.json()).toEqual({
          error: `ticks must be an integer between 1 and ${MAX_STEP_TICKS}`,
        });
      }
      expect(warehouse.driver.now()).toBe(0);
    });
  });

  describe("métricas", () => {
    it("debe exponer métricas JSON", async () => {
      warehouse.runner.step(2);

      const response = await fetch(`${baseUrl}/metrics/runtime`);

      expect(response.status).toBe(200);
      expect(await response.json()).toMatchObject({
        tick: 2,
        driver: { tick: 2, pending: 0 },
        fleet: { available: 1, working: 0, charging: 0 },
        picks: 0,
      });
    });

    it("debe exponer métricas en formato Prometheus", async () => {
      const response = await fetch(`${baseUrl}/metrics`);
      const text = await response.text();

      expect(response.status).toBe(200);
      expect(response.headers.get("content-type")).toContain("text/plain");
      expect(text).toContain("warehouse_tick 0\n");
    });

    it("debe consultar los logs en memoria", async () => {
      const response = await fetch(
        `${baseUrl}/metrics/logs?category=simulation&contains=warehouse%20ready`,
      );

      expect(response.status).toBe(200);
      expect(await response.json()).toMatchObject({
        count: 1,
        entries: [{ level: "info", category: "simulation" }],
      });
    });
  });
});
