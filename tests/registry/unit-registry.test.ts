import { describe, it, expect } from "vitest";
import { UnitRegistry, nextState, compareIds } from "../../src/registry/unit-registry.js";
import { OrchestratorEventBus } from "../../src/events.js";
import { InvalidTransitionError, NotFoundError } from "../../src/errors.js";

function healthyUnit(registry: UnitRegistry, id: string, tier = 1): void {
  registry.register({ id, tier });
  registry.attachHandle(id, { handle: `ctr-${id}`, address: `10.0.0.1:8080` });
  registry.transition(id, "provisioned");
}

describe("nextState", () => {
  it("follows the lifecycle graph", () => {
    expect(nextState("provisioning", "provisioned")).toBe("healthy");
    expect(nextState("healthy", "degrade")).toBe("degraded");
    expect(nextState("degraded", "recover")).toBe("healthy");
    expect(nextState("unhealthy", "drain")).toBe("draining");
    expect(nextState("draining", "terminate")).toBe("terminated");
  });

  it("rejects illegal events", () => {
    expect(nextState("terminated", "provisioned")).toBeNull();
    expect(nextState("healthy", "terminate")).toBeNull();
    expect(nextState("draining", "recover")).toBeNull();
  });
});

describe("compareIds", () => {
  it("orders lexically", () => {
    expect(compareIds("a", "b")).toBe(-1);
    expect(compareIds("b", "a")).toBe(1);
    expect(compareIds("a", "a")).toBe(0);
  });
});

describe("UnitRegistry", () => {
  it("registers units in provisioning state and emits an event", () => {
    const bus = new OrchestratorEventBus();
    const registry = new UnitRegistry(bus);
    const seen: string[] = [];
    bus.onTyped("unit:registered", ({ unit }) => seen.push(unit.id));

    const unit = registry.register({ id: "u1", tier: 2 });

    expect(unit.state).toBe("provisioning");
    expect(unit.tier).toBe(2);
    expect(unit.assignedSession).toBeNull();
    expect(seen).toEqual(["u1"]);
    expect(registry.size).toBe(1);
  });

  it("rejects duplicate ids", () => {
    const registry = new UnitRegistry(new OrchestratorEventBus());
    registry.register({ id: "u1", tier: 1 });
    expect(() => registry.register({ id: "u1", tier: 1 })).toThrow(InvalidTransitionError);
  });

  it("emits state changes with from/to", () => {
    const bus = new OrchestratorEventBus();
    const registry = new UnitRegistry(bus);
    const changes: string[] = [];
    bus.onTyped("unit:state", ({ from, to }) => changes.push(`${from}->${to}`));

    healthyUnit(registry, "u1");
    registry.transition("u1", "degrade");

    expect(changes).toEqual(["provisioning->healthy", "healthy->degraded"]);
  });

  it("throws InvalidTransitionError on an illegal transition", () => {
    const registry = new UnitRegistry(new OrchestratorEventBus());
    registry.register({ id: "u1", tier: 1 });
    expect(() => registry.transition("u1", "drain")).toThrow("unit 'u1' cannot 'drain' while provisioning");
  });

  it("throws NotFoundError for unknown units", () => {
    const registry = new UnitRegistry(new OrchestratorEventBus());
    expect(() => registry.get("nope")).toThrow(NotFoundError);
    expect(registry.find("nope")).toBeUndefined();
  });

  it("returns snapshots that do not change with the record", () => {
    const registry = new UnitRegistry(new OrchestratorEventBus());
    const before = registry.register({ id: "u1", tier: 1 });
    registry.transition("u1", "provisioned");
    expect(before.state).toBe("provisioning");
    expect(registry.get("u1").state).toBe("healthy");
  });

  it("assigns only healthy unbound units", () => {
    const registry = new UnitRegistry(new OrchestratorEventBus());
    registry.register({ id: "p1", tier: 1 });
    expect(() => registry.assign("p1", "s1")).toThrow("unit 'p1' is provisioning and cannot be assigned");

    healthyUnit(registry, "u1");
    registry.assign("u1", "s1");
    expect(() => registry.assign("u1", "s2")).toThrow("unit 'u1' is already assigned to session 's1'");
  });

  it("distinguishes released and evicted unassignments", () => {
    const bus = new OrchestratorEventBus();
    const registry = new UnitRegistry(bus);
    const released: string[] = [];
    const evicted: string[] = [];
    bus.onTyped("unit:released", ({ sessionId }) => released.push(sessionId));
    bus.onTyped("unit:evicted", ({ sessionId, reason }) => evicted.push(`${sessionId}:${reason}`));

    healthyUnit(registry, "u1");
    healthyUnit(registry, "u2");
    registry.assign("u1", "s1");
    registry.assign("u2", "s2");

    expect(registry.unassign("u1")).toBe("s1");
    expect(registry.unassign("u2", "evicted", "forced recycle")).toBe("s2");
    expect(registry.unassign("u2")).toBeNull();
    expect(released).toEqual(["s1"]);
    expect(evicted).toEqual(["s2:forced recycle"]);
  });

  it("lists by tier and state", () => {
    const registry = new UnitRegistry(new OrchestratorEventBus());
    healthyUnit(registry, "a", 1);
    healthyUnit(registry, "b", 2);
    registry.register({ id: "c", tier: 1 });

    expect(registry.list(1).map((u) => u.id).sort()).toEqual(["a", "c"]);
    expect(registry.list(1, ["healthy"]).map((u) => u.id)).toEqual(["a"]);
    expect(registry.list().length).toBe(3);
  });

  it("counts consecutive probe failures and resets on success", () => {
    const registry = new UnitRegistry(new OrchestratorEventBus());
    healthyUnit(registry, "u1");
    expect(registry.recordProbe("u1", false)).toBe(1);
    expect(registry.recordProbe("u1", false)).toBe(2);
    expect(registry.recordProbe("u1", true)).toBe(0);
    expect(registry.get("u1").lastHealthCheck).toBeInstanceOf(Date);
  });

  it("only removes terminated units and remembers them", () => {
    const bus = new OrchestratorEventBus();
    const registry = new UnitRegistry(bus);
    const removed: string[] = [];
    bus.onTyped("unit:removed", ({ unitId }) => removed.push(unitId));
    healthyUnit(registry, "u1");

    expect(() => registry.remove("u1")).toThrow("unit 'u1' is healthy; only terminated units can be removed");

    registry.transition("u1", "drain");
    registry.transition("u1", "terminate");
    registry.remove("u1");

    expect(registry.find("u1")).toBeUndefined();
    expect(registry.wasRemoved("u1")).toBe(true);
    expect(removed).toEqual(["u1"]);
  });
});
