import { z } from "zod";

/**
 * Zod schemas for process documents.
 * The loader parses the raw JSON with ProcessDocumentSchema before mapping it to topics.
 */

const IdSchema = z.string().trim().min(1).describe("Stable topic id, unique across the document");
const TitleSchema = z.string().trim().min(1).describe("Topic title");
const TopicTypeSchema = z
  .string()
  .optional()
  .describe("Topic type title from data/topic-types.json; level default when omitted or unknown");
const TagsSchema = z.array(z.string().min(1)).default([]).describe("Tags added to the topic");

export const InstructionSchema = z.object({
  id: IdSchema,
  title: TitleSchema,
  content: z.string().optional().describe("Instruction text, stored in the topic's content part"),
  topicType: TopicTypeSchema,
  tags: TagsSchema,
});

export const StepSchema = z.object({
  id: IdSchema,
  title: TitleSchema,
  description: z.string().optional(),
  topicType: TopicTypeSchema,
  tags: TagsSchema,
  instructions: z.array(InstructionSchema).default([]),
});

export const TaskSchema = z.object({
  id: IdSchema,
  title: TitleSchema,
  description: z.string().optional(),
  topicType: TopicTypeSchema,
  tags: TagsSchema,
  steps: z.array(StepSchema).default([]),
});

export const ProcessSchema = z.object({
  id: IdSchema,
  title: TitleSchema,
  description: z.string().optional(),
  topicType: TopicTypeSchema,
  tags: TagsSchema,
  tasks: z.array(TaskSchema).default([]).describe("Children of the process, mapped before its steps"),
  steps: z.array(StepSchema).default([]),
});

export const ProcessDocumentSchema = z.object({
  process: ProcessSchema,
});

export type Instruction = z.infer<typeof InstructionSchema>;
export type Step = z.infer<typeof StepSchema>;
export type Task = z.infer<typeof TaskSchema>;
export type Process = z.infer<typeof ProcessSchema>;
export type ProcessDocument = z.infer<typeof ProcessDocumentSchema>;
