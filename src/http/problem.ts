export interface FieldError {
  path: string;
  message: string;
}

export interface Problem {
  type: string;
  title: string;
  status: number;
  detail?: string;
  instance?: string;
  code?: string;
  requestId?: string;
  errors?: FieldError[];
}

export type ProblemCode =
  | "INVALID_ARGUMENT"
  | "INVALID_JSON"
  | "UNSUPPORTED_MEDIA_TYPE"
  | "EMPTY_INPUT"
  | "MALFORMED_ANNOTATION"
  | "NOT_FOUND"
  | "INTERNAL";

export const PROBLEM_CONTENT_TYPE = "application/problem+json";

export function problem(params: {
  status: number;
  code: ProblemCode;
  detail?: string;
  instance?: string;
  errors?: FieldError[];
  requestId?: string;
}): Problem {
  const type = `https://errors.texnorm.local/${params.code.toLowerCase().replace(/_/g, "-")}`;
  return {
    type,
    title: codeToTitle(params.code),
    status: params.status,
    detail: params.detail,
    instance: params.instance,
    code: params.code,
    requestId: params.requestId,
    errors: params.errors,
  };
}

function codeToTitle(code: ProblemCode): string {
  switch (code) {
    case "INVALID_ARGUMENT":
      return "Invalid argument";
    case "INVALID_JSON":
      return "Invalid JSON";
    case "UNSUPPORTED_MEDIA_TYPE":
      return "Unsupported media type";
    case "EMPTY_INPUT":
      return "Empty input";
    case "MALFORMED_ANNOTATION":
      return "Malformed annotation";
    case "NOT_FOUND":
      return "Not found";
    case "INTERNAL":
      return "Internal error";
  }
}
