import { XMLParser } from "fast-xml-parser";
import { IntrospectionFailure, SignatureError } from "../errors";
import { parseSignature, type SignatureOptions } from "../signature/parse";
import type { TypeSignature } from "../signature/types";
import type {
  Annotation,
  ArgDescriptor,
  InterfaceDescriptor,
  MethodDescriptor,
  NodeDescription,
  PropertyAccess,
  PropertyDescriptor,
  SignalDescriptor,
} from "./types";

const REPEATED = new Set(["node", "interface", "method", "signal", "property", "arg", "annotation"]);
const SEGMENT = /^[A-Za-z0-9_]+$/;
const ATTR = "@_";

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: ATTR,
  parseAttributeValue: false,
  isArray: (name: string, _jpath: string, _isLeaf: boolean, isAttribute: boolean) =>
    !isAttribute && REPEATED.has(name),
});

type Element = Record<string, unknown>;

function isElement(u: unknown): u is Element {
  return typeof u === "object" && u !== null && !Array.isArray(u);
}

function elements(parent: Element, tag: string): Element[] {
  const raw = parent[tag];
  if (!Array.isArray(raw)) return [];
  // Self-closing elements with no attributes come back as empty strings.
  return raw.map((item: unknown) => (isElement(item) ? item : {}));
}

function attr(el: Element, name: string): string | undefined {
  const v = el[`${ATTR}${name}`];
  return typeof v === "string" ? v : undefined;
}

function requireAttr(el: Element, name: string, where: string): string {
  const v = attr(el, name);
  if (v === undefined || v === "") {
    throw new Error(`${where} is missing its '${name}' attribute`);
  }
  return v;
}

/**
 * Reads the introspection XML of one object path. Unknown elements and
 * attributes are ignored; a bad child name or signature fails the whole
 * description.
 *
 * @throws IntrospectionFailure
 */
export function parseIntrospection(
  xml: string,
  path: string,
  opts: SignatureOptions = {}
): NodeDescription {
  if (xml.trim() === "") {
    return { children: [], interfaces: [] };
  }
  try {
    const doc: unknown = xmlParser.parse(xml, true);
    if (!isElement(doc)) {
      throw new Error("document has no root element");
    }
    const [root] = elements(doc, "node");
    if (root === undefined) {
      throw new Error("document has no <node> root");
    }
    return {
      children: elements(root, "node").map(childName),
      interfaces: elements(root, "interface").map((el) => readInterface(el, opts)),
    };
  } catch (e) {
    const detail = e instanceof SignatureError ? `bad signature: ${e.message}` : e instanceof Error ? e.message : String(e);
    throw new IntrospectionFailure(path, detail);
  }
}

function childName(el: Element): string {
  const name = requireAttr(el, "name", "child <node>");
  if (!SEGMENT.test(name)) {
    throw new Error(`invalid child node name '${name}'`);
  }
  return name;
}

function readAnnotations(el: Element): Annotation[] {
  return elements(el, "annotation").map((a) => ({
    name: attr(a, "name") ?? "",
    value: attr(a, "value") ?? "",
  }));
}

function readSignature(el: Element, where: string, opts: SignatureOptions): TypeSignature {
  return parseSignature(requireAttr(el, "type", where), opts);
}

function readArg(el: Element, where: string, opts: SignatureOptions): ArgDescriptor {
  const name = attr(el, "name");
  const argWhere = `${where} arg${name ? ` '${name}'` : ""}`;
  return name ? { name, signature: readSignature(el, argWhere, opts) } : { signature: readSignature(el, argWhere, opts) };
}

function readMethod(el: Element, iface: string, opts: SignatureOptions): MethodDescriptor {
  const name = requireAttr(el, "name", `method in ${iface}`);
  const where = `method ${iface}.${name}`;
  const inArgs: ArgDescriptor[] = [];
  const outArgs: ArgDescriptor[] = [];
  for (const a of elements(el, "arg")) {
    const arg = readArg(a, where, opts);
    if (attr(a, "direction") === "out") {
      outArgs.push(arg);
    } else {
      inArgs.push(arg);
    }
  }
  return { name, inArgs, outArgs, annotations: readAnnotations(el) };
}

function readAccess(el: Element): PropertyAccess {
  const access = attr(el, "access");
  return access === "write" || access === "readwrite" ? access : "read";
}

function readProperty(el: Element, iface: string, opts: SignatureOptions): PropertyDescriptor {
  const name = requireAttr(el, "name", `property in ${iface}`);
  return {
    name,
    signature: readSignature(el, `property ${iface}.${name}`, opts),
    access: readAccess(el),
    annotations: readAnnotations(el),
  };
}

function readSignal(el: Element, iface: string, opts: SignatureOptions): SignalDescriptor {
  const name = requireAttr(el, "name", `signal in ${iface}`);
  const where = `signal ${iface}.${name}`;
  return {
    name,
    args: elements(el, "arg").map((a) => readArg(a, where, opts)),
    annotations: readAnnotations(el),
  };
}

function readInterface(el: Element, opts: SignatureOptions): InterfaceDescriptor {
  const name = requireAttr(el, "name", "<interface>");
  return {
    name,
    methods: elements(el, "method").map((m) => readMethod(m, name, opts)),
    properties: elements(el, "property").map((p) => readProperty(p, name, opts)),
    signals: elements(el, "signal").map((s) => readSignal(s, name, opts)),
    annotations: readAnnotations(el),
  };
}
