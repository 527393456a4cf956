// src/ninjaApi.ts
import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import { baseUrlFor, type NinjaConfig } from "./config";
import {
  fetchAllPages,
  type FetchAllOptions,
  type PageRequester,
} from "./pagination";

export const organizationSchema = z.object({
  id: z.number(),
  name: z.string(),
  description: z.string().nullish(),
});
export type NinjaOrganization = z.infer<typeof organizationSchema>;

export const policyAssignmentSchema = z.object({
  nodeRoleId: z.number(),
  policyId: z.number(),
});
export type PolicyAssignment = z.infer<typeof policyAssignmentSchema>;

// organizations-detailed adds role → policy assignments (and locations, settings, ...)
export const detailedOrganizationSchema = organizationSchema.extend({
  policies: z.array(policyAssignmentSchema).nullish(),
});
export type NinjaDetailedOrganization = z.infer<typeof detailedOrganizationSchema>;

export const namedEntitySchema = z.object({
  id: z.number(),
  name: z.string(),
});
export type NinjaPolicy = z.infer<typeof namedEntitySchema>;
export type NinjaRole = z.infer<typeof namedEntitySchema>;

export const locationSchema = namedEntitySchema.extend({
  organizationId: z.number().nullish(),
});
export type NinjaLocation = z.infer<typeof locationSchema>;

export const deviceSchema = z.object({
  id: z.number(),
  systemName: z.string().nullish(),
  organizationId: z.number().nullish(),
  locationId: z.number().nullish(),
  approvalStatus: z.string().nullish(),
  offline: z.boolean().nullish(),
  // Unix epoch seconds, fractional
  created: z.number().nullish(),
  lastContact: z.number().nullish(),
});
export type NinjaDevice = z.infer<typeof deviceSchema>;

export type CustomFieldValues = Record<string, string>;

export function createNinjaClient(config: NinjaConfig, accessToken: string): AxiosInstance {
  return axios.create({
    baseURL: `${baseUrlFor(config)}/api/v2`,
    headers: {
      Authorization: `Bearer ${accessToken}`,
      Accept: "application/json",
    },
  });
}

export function axiosPageRequester(client: AxiosInstance): PageRequester {
  return async (path, params) => {
    const res = await client.get<unknown>(path, { params });
    return res.data;
  };
}

/**
 * Thin wrapper over the list/update endpoints the scripts use. Every list
 * call walks all pages; a failing page yields a partial list, not an error.
 */
export class NinjaApi {
  private readonly request: PageRequester;

  constructor(
    private readonly client: AxiosInstance,
    private readonly pageSize?: number
  ) {
    this.request = axiosPageRequester(client);
  }

  private list<T>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    params?: FetchAllOptions["params"]
  ): Promise<T[]> {
    return fetchAllPages(this.request, path, schema, { pageSize: this.pageSize, params });
  }

  listOrganizations(): Promise<NinjaOrganization[]> {
    return this.list("/organizations", organizationSchema);
  }

  listOrganizationsDetailed(): Promise<NinjaDetailedOrganization[]> {
    return this.list("/organizations-detailed", detailedOrganizationSchema);
  }

  listPolicies(): Promise<NinjaPolicy[]> {
    return this.list("/policies", namedEntitySchema);
  }

  listRoles(): Promise<NinjaRole[]> {
    return this.list("/roles", namedEntitySchema);
  }

  listLocations(): Promise<NinjaLocation[]> {
    return this.list("/locations", locationSchema);
  }

  /**
   * @param df - device filter expression, e.g. "org = 12" or "class in (WINDOWS_SERVER)"
   */
  listDevices(df?: string): Promise<NinjaDevice[]> {
    return this.list("/devices", deviceSchema, df ? { df } : undefined);
  }

  async updateOrganizationCustomFields(
    organizationId: number,
    fields: CustomFieldValues
  ): Promise<void> {
    await this.client.patch(`/organization/${organizationId}/custom-fields`, fields, {
      headers: { "Content-Type": "application/json" },
    });
  }
}
