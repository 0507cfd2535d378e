export {
  WorkspaceError,
  type WorkspaceErrorCode,
} from "./errors.ts";

export { SubjectValidationError, parseSubjects, parseSubject } from "./subject-validation.ts";

export { loadSubjectsFile, parseSubjectsYaml } from "./subject-loader.ts";
