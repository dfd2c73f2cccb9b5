export interface TemplateRewrite {
  /** Literal text; every occurrence is replaced. */
  pattern: string;
  /** May reference `{port}`, `{sandbox}` and other run values. */
  replacement: string;
}

export interface ConfigurationTemplate {
  source: string;
  /** File name inside the sandbox. Defaults to the source's base name. */
  target?: string;
  rewrites?: TemplateRewrite[];
}

export interface SandboxDirectory {
  path: string;
  /** Names of the seeded files, in template order. */
  files: string[];
}
