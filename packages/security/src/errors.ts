// Errors raised when a security configuration or task scope is rejected

/** A SecurityConfig or TaskFileScope failed validation; the caller keeps its prior state. */
export class SecurityConfigError extends Error {
  public readonly issues: string[];

  constructor(issues: string[], cause?: Error) {
    super(
      issues.length === 1
        ? `Invalid security configuration: ${issues[0]}`
        : ["Invalid security configuration:", ...issues.map((issue) => `- ${issue}`)].join("\n"),
      { cause },
    );
    this.name = "SecurityConfigError";
    this.issues = issues;
  }
}
