import { describe, expect, it } from "vitest";
import { createTestApp } from "../fixtures/app.js";

describe("Agents API", () => {
  it("lists the platform's agents", async () => {
    const { app, store } = createTestApp({
      agents: [
        { id: "agent-1", name: "Helper" },
        { id: "agent-2", username: "support" },
      ],
    });

    const res = await app.request("/agents");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      success: true,
      data: {
        agents: [
          { id: "agent-1", name: "Helper" },
          { id: "agent-2", username: "support" },
        ],
      },
    });
    store.close();
  });
});
