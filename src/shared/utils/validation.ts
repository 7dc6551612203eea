interface SchemaIssue {
  readonly path: readonly PropertyKey[];
  readonly message: string;
}

/** One-line summary of schema validation issues, e.g. `high_impact.min_files: Too small` */
export function formatSchemaIssues(issues: readonly SchemaIssue[]): string {
  return issues
    .map((issue) => {
      const path = issue.path.map((segment) => String(segment)).join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}
