import { describe, it, expect } from "vitest";
import { KubernetesCapability } from "@envswitch/adapters/capabilities";
import { CapabilityRegistry } from "../capability-registry";
import { RegistryLockedError } from "../../../errors";
import { FakeCapability } from "../../../__fixtures__/fake-capability";

const ctx = { signal: new AbortController().signal };

describe("CapabilityRegistry", () => {
  it("should list registered services sorted", () => {
    const registry = new CapabilityRegistry()
      .register(new FakeCapability("kube"))
      .register(new FakeCapability("aws"))
      .registerAs("docker-remote", new FakeCapability("docker"));

    expect(registry.list()).toEqual(["aws", "docker-remote", "kube"]);
    expect(registry.has("docker")).toBe(false);
    expect(registry.get("docker-remote")?.name).toBe("docker-remote");
  });

  it("should bind the configuration variant of the capability kind", async () => {
    const fake = new FakeCapability("local");
    const handle = new CapabilityRegistry().register(fake).get("local");

    expect(handle?.kind).toBe("docker");
    expect(handle?.prepare({ kubernetes: { context: "prod" } })).toBeUndefined();

    await handle?.prepare({ docker: { context: "colima" } })?.apply(ctx);
    expect(fake.applied).toEqual([{ context: "colima" }]);
  });

  it("should bind kinds other than docker", () => {
    const handle = new CapabilityRegistry().register(new KubernetesCapability()).get("kubernetes");

    expect(handle?.kind).toBe("kubernetes");
    expect(handle?.prepare({ docker: { context: "colima" } })).toBeUndefined();
    expect(handle?.prepare({ kubernetes: { context: "prod" } })).toBeDefined();
  });

  it("should hand the captured state back on restore", async () => {
    const fake = new FakeCapability("local", { state: "desktop-linux" });
    const handle = new CapabilityRegistry().register(fake).get("local");

    const captured = await handle?.captureState(ctx);
    await captured?.restore(ctx);

    expect(fake.restored).toEqual(["desktop-linux"]);
  });

  it("should refuse registration while leased", () => {
    const registry = new CapabilityRegistry();
    const release = registry.lease();

    expect(registry.locked).toBe(true);
    expect(() => registry.register(new FakeCapability("aws"))).toThrow(RegistryLockedError);
    expect(() => registry.register(new FakeCapability("aws"))).toThrow(
      'cannot register "aws" while a switch is in progress',
    );

    release();
    release();

    expect(registry.locked).toBe(false);
    expect(registry.register(new FakeCapability("aws")).list()).toEqual(["aws"]);
  });

  it("should stay locked until every lease is released", () => {
    const registry = new CapabilityRegistry();
    const first = registry.lease();
    const second = registry.lease();

    first();
    expect(registry.locked).toBe(true);
    second();
    expect(registry.locked).toBe(false);
  });
});
