import { TraditionalAuthManager } from "../../src/auth/traditional-auth.js";
import { SessionClient } from "../../src/api/client.js";
import { TopicApi } from "../../src/api/topics.js";
import type { FetchFn } from "../../src/api/http.js";
import type { AuthContext } from "../../src/types/index.js";
import { API_KEY, BASE_URL, type MockCms } from "./mock-cms.js";

export const TEST_CONTEXT: AuthContext = {
  tenantId: "tenant-1",
  projectId: "project-1",
  acl: ["acl-1"],
  ntAccount: "DOMAIN\\tester",
};

/** TopicApi over the traditional auth manager, both talking to the mock (or `fetch`, when given). */
export function topicApiFor(cms: MockCms, fetch: FetchFn = cms.fetch): TopicApi {
  const auth = new TraditionalAuthManager(
    { context: TEST_CONTEXT, baseUrl: BASE_URL, apiKey: API_KEY },
    { fetch },
  );
  return new TopicApi(new SessionClient({ baseUrl: BASE_URL, auth, fetch }));
}
