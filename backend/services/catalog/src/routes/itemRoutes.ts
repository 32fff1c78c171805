// backend/services/catalog/src/routes/itemRoutes.ts
import { Router } from "express";
import { bindRoute, type BindRouteOptions } from "@reqbind/shared/http/express/bindRoute";
import { EnvelopeFormatter } from "../http/EnvelopeFormatter";
import type { ItemRepo } from "../repo/itemRepo";
import {
  CreateItemRequest,
  GetItemRequest,
  SearchItemsRequest,
  UploadAttachmentsRequest,
} from "../requests/item.requests";
import { makeCreateItem } from "../handlers/item/createItem";
import { makeGetItem } from "../handlers/item/getItem";
import { makeSearchItems } from "../handlers/item/searchItems";
import { makeUploadAttachments } from "../handlers/item/uploadAttachments";
import type { RouteDefaults } from "./routeDefaults";

export function itemRoutes(repo: ItemRepo, defaults: RouteDefaults): Router {
  const router = Router();
  const envelope = new EnvelopeFormatter();
  const opts = (route: string, extra: Partial<BindRouteOptions> = {}): BindRouteOptions => ({
    ...defaults.pipeline,
    formatter: envelope,
    route,
    ...extra,
  });

  // one-liners only; handlers own the logic
  router.get("/", bindRoute(SearchItemsRequest, makeSearchItems(repo), opts("GET /items")));
  router.get("/:id", bindRoute(GetItemRequest, makeGetItem(repo), opts("GET /items/:id")));
  router.post(
    "/",
    bindRoute(CreateItemRequest, makeCreateItem(repo), opts("POST /items", {
      formatter: new EnvelopeFormatter({ successStatus: 201 }),
    }))
  );
  router.post(
    "/:id/attachments",
    bindRoute(UploadAttachmentsRequest, makeUploadAttachments(repo), opts("POST /items/:id/attachments", {
      multipartMemory: defaults.multipartMemory,
      formatter: new EnvelopeFormatter({ successStatus: 201 }),
    }))
  );

  return router;
}
