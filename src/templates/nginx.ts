export type NginxDirective = {
  kind: "directive";
  name: string;
  args: readonly (string | number)[];
};

export type NginxBlock = {
  kind: "block";
  name: string;
  args: readonly (string | number)[];
  children: readonly NginxNode[];
};

export type NginxNode = NginxDirective | NginxBlock | { kind: "blank" };

export const directive = (
  name: string,
  ...args: (string | number)[]
): NginxDirective => ({ kind: "directive", name, args });

export const block = (
  name: string,
  args: (string | number)[],
  children: NginxNode[]
): NginxBlock => ({ kind: "block", name, args, children });

export const blank: NginxNode = { kind: "blank" };

const INDENT = "    ";
const NEEDS_QUOTING = /[\s;{}'"\\#]/;

/** Quotes an argument when nginx would otherwise split or misread it. */
export const quoteArg = (arg: string | number): string => {
  const value = String(arg);
  if (value !== "" && !NEEDS_QUOTING.test(value)) return value;
  return `'${value.replace(/\\/g, "\\\\").replace(/'/g, "\\'")}'`;
};

const renderNode = (node: NginxNode, depth: number): string[] => {
  const indent = INDENT.repeat(depth);
  switch (node.kind) {
    case "blank":
      return [""];
    case "directive":
      return [
        `${indent}${[node.name, ...node.args.map(quoteArg)].join(" ")};`,
      ];
    case "block":
      return [
        `${indent}${[node.name, ...node.args.map(quoteArg), "{"].join(" ")}`,
        ...node.children.flatMap((child) => renderNode(child, depth + 1)),
        `${indent}}`,
      ];
  }
};

/** Serializes a configuration tree; output always ends with a newline. */
export const serializeNginx = (nodes: readonly NginxNode[]): string =>
  nodes
    .flatMap((node) => renderNode(node, 0))
    .map((line) => line.trimEnd())
    .join("\n") + "\n";
