import { describe, it, expect } from "vitest";
import { GET as healthz } from "@/app/healthz/route";
import { GET as root } from "@/app/route";

describe("service probes", () => {
  it("GET /healthz reports ok", async () => {
    const res = await healthz();

    expect(res.status).toBe(200);
    expect(res.headers.get("Content-Type")).toBe("application/json");
    expect(await res.json()).toEqual({ status: "ok" });
  });

  it("GET / greets", async () => {
    const res = await root();

    expect(res.status).toBe(200);
    expect(await res.text()).toBe("Hello from Topic & Skill Service!");
  });
});
