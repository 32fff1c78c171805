// backend/services/catalog/src/routes/routeDefaults.ts
/**
 * Purpose:
 * - Pipeline options every catalog route shares, derived from BindingConfig.
 */

import type { BindingConfig } from "@reqbind/shared/config/bindingConfig";
import type { InboundRequest } from "@reqbind/shared/http/InboundRequest";
import type { BindPipelineOptions } from "@reqbind/shared/http/pipeline/BindPipeline";

export type RouteDefaults = {
  pipeline: BindPipelineOptions;
  multipartMemory: number;
};

/** Caller-supplied X-Trace-ID, else the request id. */
export function traceIdOf(req: InboundRequest): string | undefined {
  return req.header("x-trace-id") || req.requestId;
}

export function routeDefaults(config: BindingConfig): RouteDefaults {
  return {
    pipeline: {
      maxBodySize: config.maxBodySize,
      json: config.json,
      noVarySearch: config.noVarySearch,
      traceId: traceIdOf,
    },
    multipartMemory: config.multipartMemory,
  };
}
