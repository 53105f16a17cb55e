// fs errors can come from another realm under a test runner, so no instanceof here
export const hasErrorCode = (err: unknown, code: string): boolean =>
  typeof err === "object" && err !== null && "code" in err && err.code === code;
