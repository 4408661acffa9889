export const roles = [
  "student",
  "institute_admin",
  "department_admin",
  "finance_admin",
  "admin",
] as const;
export type Role = (typeof roles)[number];

export const applicationStatuses = [
  "draft",
  "submitted",
  "under_review",
  "document_verification",
  "eligibility_check",
  "approved",
  "partially_approved",
  "rejected",
  "on_hold",
  "cancelled",
  "disbursed",
  "completed",
] as const;
export type ApplicationStatus = (typeof applicationStatuses)[number];

// Statuses from which the institute reviewer may act
export const instituteReviewableStatuses = [
  "submitted",
  "under_review",
  "document_verification",
  "eligibility_check",
] as const satisfies readonly ApplicationStatus[];

export const instituteApprovedStatuses = [
  "approved",
  "partially_approved",
] as const satisfies readonly ApplicationStatus[];

export const priorities = ["low", "medium", "high", "urgent"] as const;
export type Priority = (typeof priorities)[number];

export const scholarshipTypes = [
  "merit",
  "need",
  "minority",
  "sports",
  "arts",
  "research",
  "disability",
  "first_generation",
  "girl_child",
  "rural",
  "other",
] as const;
export type ScholarshipType = (typeof scholarshipTypes)[number];

export const courseLevels = ["undergraduate", "postgraduate", "doctoral", "diploma"] as const;
export type CourseLevel = (typeof courseLevels)[number];

export const stages = ["intake", "institute", "department", "finance"] as const;
export type Stage = (typeof stages)[number];

export const decisionActions = [
  "submit",
  "start_review",
  "request_documents",
  "start_eligibility_check",
  "hold",
  "resume_review",
  "transition",
  "institute_approve",
  "institute_partially_approve",
  "institute_reject",
  "dept_approve",
  "dept_reject",
  "forward_to_finance",
  "amount_applied",
  "disbursement_created",
  "bank_details_updated",
  "transfer_started",
  "transfer_succeeded",
  "transfer_failed",
  "disbursement_cancelled",
  "complete",
] as const;
export type DecisionAction = (typeof decisionActions)[number];

export const instituteReviewActions = ["approve", "reject", "request_documents", "hold"] as const;
export type InstituteReviewAction = (typeof instituteReviewActions)[number];

export const departmentReviewActions = ["dept_approve", "dept_reject"] as const;
export type DepartmentReviewAction = (typeof departmentReviewActions)[number];

export const disbursementStatuses = [
  "pending",
  "processing",
  "disbursed",
  "failed",
  "cancelled",
] as const;
export type DisbursementStatus = (typeof disbursementStatuses)[number];

export const disbursementMethods = ["bank_transfer", "cheque", "cash", "fee_adjustment"] as const;
export type DisbursementMethod = (typeof disbursementMethods)[number];

export const calculationStrategies = [
  "standard",
  "need_based",
  "merit_based",
  "government_scheme",
  "custom",
] as const;
export type CalculationStrategy = (typeof calculationStrategies)[number];

export const socialCategories = ["sc", "st", "obc", "general", "minority"] as const;
export type SocialCategory = (typeof socialCategories)[number];

export const locationTypes = ["rural", "urban"] as const;
export type LocationType = (typeof locationTypes)[number];
