import { z } from "zod";
import type { SessionClient } from "./client.js";
import type {
  CheckinRequest,
  CreateTopicRequest,
  PartRequest,
  RelationRequest,
  TagRequest,
} from "./types.js";

const CreateTopicResponseSchema = z
  .looseObject({
    topicId: z.string().optional(),
    topicVersionId: z.string().optional(),
    topicVersionKey: z.string().optional(),
  })
  .optional();

const RemoteTopicSchema = z.looseObject({
  topicId: z.string().optional(),
  topicTitle: z.string().optional(),
  topicTypeId: z.string().optional(),
  parentTopicId: z.string().nullish(),
});

const PartSchema = z.looseObject({
  name: z.string(),
  content: z.unknown(),
});

const PartListSchema = z.union([
  z.array(PartSchema),
  z.object({ parts: z.array(PartSchema) }).transform((value) => value.parts),
]);

export type CreateTopicResult = NonNullable<z.infer<typeof CreateTopicResponseSchema>>;
export type RemoteTopic = z.infer<typeof RemoteTopicSchema>;
export type RemotePart = z.infer<typeof PartSchema>;

function topicPath(topicId: string): string {
  return `/topics/${encodeURIComponent(topicId)}`;
}

function partPath(topicId: string, name: string): string {
  return `${topicPath(topicId)}/parts/${encodeURIComponent(name)}`;
}

/**
 * Typed wrappers over the topic REST surface. Each method is one HTTP call.
 */
export class TopicApi {
  constructor(private readonly client: SessionClient) {}

  async createTopic(request: CreateTopicRequest): Promise<CreateTopicResult> {
    const body = await this.client.post("/topics", request);
    const parsed = CreateTopicResponseSchema.safeParse(body);
    return parsed.success && parsed.data ? parsed.data : {};
  }

  async getTopic(topicId: string): Promise<RemoteTopic> {
    return RemoteTopicSchema.parse(await this.client.get(topicPath(topicId)));
  }

  async updateTopic(topicId: string, changes: Record<string, unknown>): Promise<void> {
    await this.client.put(topicPath(topicId), changes);
  }

  async updateMetadata(topicId: string, metadata: Readonly<Record<string, unknown>>): Promise<void> {
    await this.updateTopic(topicId, { metadata });
  }

  async deleteTopic(topicId: string): Promise<void> {
    await this.client.delete(topicPath(topicId));
  }

  async checkout(topicId: string): Promise<void> {
    await this.client.post(`${topicPath(topicId)}/checkout`);
  }

  async checkin(topicId: string, comment?: string): Promise<void> {
    const body: CheckinRequest = comment ? { comment } : {};
    await this.client.post(`${topicPath(topicId)}/checkin`, body);
  }

  async listParts(topicId: string): Promise<RemotePart[]> {
    return PartListSchema.parse(await this.client.get(`${topicPath(topicId)}/parts`));
  }

  async getPart(topicId: string, name: string): Promise<RemotePart> {
    return PartSchema.parse(await this.client.get(partPath(topicId, name)));
  }

  async createPart(topicId: string, name: string, content: unknown): Promise<void> {
    const body: PartRequest = { name, content };
    await this.client.post(`${topicPath(topicId)}/parts`, body);
  }

  async updatePart(topicId: string, name: string, content: unknown): Promise<void> {
    const body: PartRequest = { name, content };
    await this.client.put(partPath(topicId, name), body);
  }

  async deletePart(topicId: string, name: string): Promise<void> {
    await this.client.delete(partPath(topicId, name));
  }

  async addRelation(topicId: string, relationTypeId: string, targetTopicIds: string[]): Promise<void> {
    const body: RelationRequest = { relationTypeId, sourceTopicId: topicId, targetTopicIds };
    await this.client.post(`${topicPath(topicId)}/relations`, body);
  }

  async addTag(topicId: string, tag: string): Promise<void> {
    const body: TagRequest = { tags: [tag] };
    await this.client.post(`${topicPath(topicId)}/tags`, body);
  }

  async exportContent(): Promise<unknown> {
    return this.client.get("/export");
  }
}
