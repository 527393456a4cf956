import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { NinjaConfig } from "../src/config";
import { createNinjaClient, NinjaApi } from "../src/ninjaApi";
import { createFakeAdapter, type FakeHandler } from "./helpers/fakeAxios";

const config: NinjaConfig = {
  clientId: "test-client",
  clientSecret: "test-secret",
  region: "eu",
  host: "ninjarmm.com",
  scope: "monitoring management",
};

function apiWith(handler: FakeHandler, pageSize?: number) {
  const { adapter, calls } = createFakeAdapter(handler);
  const client = createNinjaClient(config, "test-token");
  client.defaults.adapter = adapter;
  return { api: new NinjaApi(client, pageSize), calls };
}

describe("NinjaApi", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should call the regional v2 API with a bearer token", async () => {
    const { api, calls } = apiWith(() => ({ status: 200, data: [] }));

    await api.listPolicies();

    expect(calls[0].baseURL).toBe("https://eu.ninjarmm.com/api/v2");
    expect(calls[0].url).toBe("/policies");
    expect(calls[0].headers.get("Authorization")).toBe("Bearer test-token");
  });

  it("should walk every page of organizations", async () => {
    const pages: Record<string, unknown> = {
      start: [
        { id: 1, name: "Example IT" },
        { id: 2, name: "Tech Corp" },
      ],
      "2": [{ id: 3, name: "Acme" }],
    };
    const { api, calls } = apiWith(
      (req) => ({ status: 200, data: pages[String(req.params.after ?? "start")] }),
      2
    );

    const organizations = await api.listOrganizations();

    expect(organizations.map((org) => org.name)).toEqual(["Example IT", "Tech Corp", "Acme"]);
    expect(calls.map((call) => call.params)).toEqual([{ pageSize: 2 }, { pageSize: 2, after: 2 }]);
  });

  it("should parse role/policy assignments from organizations-detailed", async () => {
    const { api, calls } = apiWith(() => ({
      status: 200,
      data: [
        { id: 1, name: "Example IT", policies: [{ nodeRoleId: 5, policyId: 9 }], locations: [] },
        { id: 2, name: "Tech Corp" },
      ],
    }));

    const organizations = await api.listOrganizationsDetailed();

    expect(calls[0].url).toBe("/organizations-detailed");
    expect(organizations).toEqual([
      { id: 1, name: "Example IT", policies: [{ nodeRoleId: 5, policyId: 9 }] },
      { id: 2, name: "Tech Corp" },
    ]);
  });

  it("should pass the device filter as df", async () => {
    const { api, calls } = apiWith(() => ({ status: 200, data: [] }));

    await api.listDevices("class in (WINDOWS_SERVER)");
    await api.listDevices();

    expect(calls[0].url).toBe("/devices");
    expect(calls[0].params).toEqual({ df: "class in (WINDOWS_SERVER)", pageSize: 1000 });
    expect(calls[1].params).toEqual({ pageSize: 1000 });
  });

  it("should list roles and locations from their endpoints", async () => {
    const { api, calls } = apiWith((req) => ({
      status: 200,
      data:
        req.url === "/roles"
          ? [{ id: 1, name: "Windows Server", nodeClass: "WINDOWS_SERVER" }]
          : [{ id: 7, name: "Main Office", organizationId: 1 }],
    }));

    const roles = await api.listRoles();
    const locations = await api.listLocations();

    expect(calls.map((call) => call.url)).toEqual(["/roles", "/locations"]);
    expect(roles).toEqual([{ id: 1, name: "Windows Server" }]);
    expect(locations).toEqual([{ id: 7, name: "Main Office", organizationId: 1 }]);
  });

  it("should return an empty list when the endpoint errors", async () => {
    const { api } = apiWith(() => ({
      status: 500,
      statusText: "Internal Server Error",
      data: { message: "oops" },
    }));

    const devices = await api.listDevices();

    expect(devices).toEqual([]);
    expect(console.error).toHaveBeenCalledWith(
      '⚠️  /devices page 1 failed: 500 Internal Server Error - {"message":"oops"}. Continuing with 0 item(s) fetched so far.'
    );
  });

  it("should PATCH organization custom fields as JSON", async () => {
    const { api, calls } = apiWith(() => ({ status: 204, data: "" }));

    await api.updateOrganizationCustomFields(42, { billingCode: "ABC123" });

    expect(calls).toHaveLength(1);
    expect(calls[0].method).toBe("patch");
    expect(calls[0].url).toBe("/organization/42/custom-fields");
    expect(JSON.parse(String(calls[0].data))).toEqual({ billingCode: "ABC123" });
  });

  it("should reject when the custom field update fails", async () => {
    const { api } = apiWith(() => ({ status: 403, statusText: "Forbidden", data: "" }));

    await expect(api.updateOrganizationCustomFields(42, { billingCode: "X" })).rejects.toThrow(
      "Request failed with status code 403"
    );
  });
});
