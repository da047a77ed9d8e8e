// Named text templates with shared helpers and sub-template inclusion

export interface TemplateScope<M, H> {
  helpers: H;
  include<K extends keyof M>(name: K, data: M[K]): string;
}

export type TemplateBody<D, M, H> = (data: D, scope: TemplateScope<M, H>) => string;

type TemplateBodies<M, H> = { [K in keyof M]?: TemplateBody<M[K], M, H> };

/**
 * A set of templates keyed by name. `M` maps each template name to the data it
 * renders; `H` is the helper table every template can call.
 */
export class TemplateSet<M, H> {
  private readonly bodies: TemplateBodies<M, H> = {};
  private readonly scope: TemplateScope<M, H>;

  constructor(helpers: H) {
    this.scope = {
      helpers,
      include: (name, data) => this.execute(name, data)
    };
  }

  define<K extends keyof M>(name: K, body: TemplateBody<M[K], M, H>): this {
    this.bodies[name] = body;
    return this;
  }

  has(name: keyof M): boolean {
    return this.bodies[name] !== undefined;
  }

  execute<K extends keyof M>(name: K, data: M[K]): string {
    const body = this.bodies[name];
    if (!body) {
      throw new Error(`template '${String(name)}' is not defined`);
    }
    return body(data, this.scope);
  }
}

export function indent(lines: string[], depth: number = 1): string[] {
  const prefix = '\t'.repeat(depth);
  return lines.map(line => (line.length > 0 ? prefix + line : line));
}
