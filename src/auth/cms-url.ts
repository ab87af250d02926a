import type { AppConfig, AuthContext } from "../types/index.js";
import { ConfigError } from "../utils/errors.js";
import { log } from "../utils/logger.js";

export interface CmsScope {
  tenantId: string;
  projectId: string;
  aclEntryId: string;
}

// Segments are opaque: anything non-empty without a slash
const CMS_URL_PATTERN = /\/tenant\/([^/?#]+)\/project\/([^/?#]+)\/acl\/([^/?#]+)/i;

/**
 * Extract tenant, project and ACL entry ids from a CMS URL such as
 * `https://company.example.com/cms/tenant/{TENANT}/project/{PROJECT}/acl/{ACL}/...`.
 *
 * @throws ConfigError when any of the three segments is missing
 */
export function parseCmsUrl(url: string): CmsScope {
  const match = CMS_URL_PATTERN.exec(url);
  if (!match) {
    throw new ConfigError(
      `could not parse CMS URL "${url}". Expected .../tenant/{TENANT_ID}/project/{PROJECT_ID}/acl/{ACL_ENTRY_ID}/...`,
    );
  }

  const [, tenantId, projectId, aclEntryId] = match;
  return { tenantId, projectId, aclEntryId };
}

/**
 * Resolve the request scope for this run. When a CMS URL is configured its
 * values take precedence over the discrete tenant/project/ACL fields.
 *
 * @throws ConfigError when the CMS URL is malformed or a field is missing
 */
export function resolveAuthContext(config: AppConfig): AuthContext {
  let tenantId = config.tenant;
  let projectId = config.projectId;
  let acl = config.acl;

  if (config.cmsUrl) {
    const scope = parseCmsUrl(config.cmsUrl);
    log("DEBUG", "Tenant, project and ACL taken from CMS URL");
    tenantId = scope.tenantId;
    projectId = scope.projectId;
    acl = [scope.aclEntryId];
  }

  const missing: string[] = [];
  if (!tenantId) missing.push("CMS_TENANT (or CMS_URL)");
  if (!projectId) missing.push("CMS_PROJECT_ID (or CMS_URL)");
  if (acl.length === 0) missing.push("CMS_ACL (or CMS_URL)");

  if (!tenantId || !projectId || missing.length > 0) {
    throw new ConfigError(`missing required credentials: ${missing.join(", ")}`);
  }

  return {
    tenantId,
    projectId,
    acl,
    ...(config.ntAccount ? { ntAccount: config.ntAccount } : {}),
  };
}
