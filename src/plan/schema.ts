/**
 * Content plan schema.
 *
 * Describes the plan shape produced by the planning step. Every field is
 * optional and unknown fields pass through: plans come from a generative
 * model and are rendered with whatever they contain. The schema is used
 * for advisory inspection only (see inspectContentPlan), never to reject
 * a plan before rendering.
 */

import { z } from "zod";

const text = z.string();
const textList = z.array(text);

export const OverviewSchema = z
  .object({
    summary: text,
    primary_use_case: text,
    problem_solved: text,
  })
  .partial()
  .passthrough();

export const PersonaSchema = z
  .object({
    name: text,
    description: text,
    key_tasks: textList,
    benefits: textList,
    prerequisites: textList,
  })
  .partial()
  .passthrough();

export const KeyConceptSchema = z
  .object({
    name: text,
    description: text,
  })
  .partial()
  .passthrough();

export const ExampleSchema = z
  .object({
    type: text,
    description: text,
  })
  .partial()
  .passthrough();

export const SubsectionSchema = z
  .object({
    title: text,
    section_id: text,
    purpose: text,
    key_points: textList,
  })
  .partial()
  .passthrough();

export const SectionSchema = z
  .object({
    title: text,
    section_id: text,
    purpose: text,
    key_points: textList,
    examples: z.array(ExampleSchema),
    visuals: textList,
    subsections: z.array(SubsectionSchema),
  })
  .partial()
  .passthrough();

export const CrossReferenceSchema = z
  .object({
    service: text,
    description: text,
    url: text,
  })
  .partial()
  .passthrough();

export const SecurityComplianceSchema = z
  .object({
    security_considerations: textList,
    compliance_requirements: textList,
  })
  .partial()
  .passthrough();

export const GlossaryEntrySchema = z
  .object({
    term: text,
    definition: text,
  })
  .partial()
  .passthrough();

export const ResourceSchema = z
  .object({
    title: text,
    description: text,
    url: text,
    type: text,
  })
  .partial()
  .passthrough();

export const ImprovementSuggestionSchema = z
  .object({
    suggestion: text,
    rationale: text,
  })
  .partial()
  .passthrough();

export const ContentPlanSchema = z
  .object({
    title: text,
    overview: OverviewSchema,
    personas: z.array(PersonaSchema),
    key_concepts: z.array(KeyConceptSchema),
    content_structure: z.array(SectionSchema),
    cross_references: z.array(CrossReferenceSchema),
    security_compliance: SecurityComplianceSchema,
    glossary: z.array(GlossaryEntrySchema),
    resources: z.array(ResourceSchema),
    improvement_suggestions: z.array(ImprovementSuggestionSchema),
    /** Model output that could not be parsed as JSON. */
    raw_content: text,
  })
  .partial()
  .passthrough();
