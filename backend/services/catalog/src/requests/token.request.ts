// backend/services/catalog/src/requests/token.request.ts
/**
 * Purpose:
 * - OAuth2 client-credentials token request. client_id / client_secret come
 *   from the form body, or from HTTP Basic auth when the form leaves them out.
 */

import { field } from "@reqbind/shared/binding/dsl";
import { HttpError } from "@reqbind/shared/http/errors";

export const CLIENT_CREDENTIALS = "client_credentials";

export class TokenRequest {
  static readonly fields = {
    grantType: field.string({ form: "grant_type" }),
    clientId: field.string({ form: "client_id" }),
    clientSecret: field.string({ form: "client_secret" }),
    scope: field.string(),
  };

  grantType = "";
  clientId = "";
  clientSecret = "";
  scope = "";

  validate(): void {
    if (this.grantType !== CLIENT_CREDENTIALS) {
      throw HttpError.validation(`unsupported grant_type "${this.grantType}"`);
    }
    if (!this.clientId) throw HttpError.validation("client_id is required");
  }
}
