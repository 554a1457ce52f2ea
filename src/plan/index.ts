/**
 * Content plans: schema, on-disk handling, and the tagged content model
 * the renderer walks.
 */

// Model
export {
  ABSENT,
  scalar,
  record,
  sequence,
  toContentValue,
  buildContentModel,
  getField,
  resolvePath,
  isTruthy,
  toPlainValue,
  type AbsentValue,
  type ScalarValue,
  type RecordValue,
  type SequenceValue,
  type ContentValue,
  type ContentModel,
} from "./model.js";

// Schema
export {
  ContentPlanSchema,
  SectionSchema,
  SubsectionSchema,
} from "./schema.js";

// Loading
export {
  loadContentPlan,
  parseContentPlan,
  saveContentPlan,
  updateContentPlan,
  inspectContentPlan,
  formatPlanIssues,
  ContentPlanLoadError,
  type RawContentPlan,
  type PlanIssue,
} from "./loader.js";
