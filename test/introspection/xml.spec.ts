// test/introspection/xml.spec.ts
// Tests for reading introspection documents

import { describe, it, expect } from "vitest";
import { parseIntrospection, describeMethod, describeProperty, describeSignal } from "../../src/introspection";
import { IntrospectionFailure } from "../../src/errors";
import { renderSignature } from "../../src/signature";

const DOC = `<!DOCTYPE node PUBLIC "-//freedesktop//DTD D-BUS Object Introspection 1.0//EN"
 "http://www.freedesktop.org/standards/dbus/1.0/introspect.dtd">
<node name="/com/example/Thing">
  <interface name="com.example.Thing">
    <method name="Lookup">
      <arg name="key" type="s" direction="in"/>
      <arg type="a{sv}" direction="out"/>
      <annotation name="org.freedesktop.DBus.Deprecated" value="true"/>
    </method>
    <method name="Ping"/>
    <property name="Size" type="t" access="read"/>
    <property name="Mode" type="s"/>
    <signal name="Changed">
      <arg name="what" type="as"/>
    </signal>
    <unknown-element foo="bar"/>
  </interface>
  <node name="beta"/>
  <node name="alpha"/>
</node>`;

function failure(xml: string): IntrospectionFailure {
  try {
    parseIntrospection(xml, "/x");
  } catch (e) {
    if (e instanceof IntrospectionFailure) return e;
    throw e;
  }
  throw new Error("expected the document to be rejected");
}

describe("parseIntrospection", () => {
  const desc = parseIntrospection(DOC, "/com/example/Thing");
  const [iface] = desc.interfaces;

  it("lists children in document order", () => {
    expect(desc.children).toEqual(["beta", "alpha"]);
  });

  it("reads methods with directions and annotations", () => {
    expect(iface?.name).toBe("com.example.Thing");
    const [lookup, ping] = iface?.methods ?? [];
    expect(lookup?.inArgs.map((a) => a.name)).toEqual(["key"]);
    expect(lookup?.outArgs.map((a) => renderSignature(a.signature))).toEqual(["a{sv}"]);
    expect(lookup?.outArgs[0]?.name).toBeUndefined();
    expect(lookup?.annotations).toEqual([{ name: "org.freedesktop.DBus.Deprecated", value: "true" }]);
    expect(ping).toEqual({ name: "Ping", inArgs: [], outArgs: [], annotations: [] });
  });

  it("treats a property without access as read-only", () => {
    expect(iface?.properties.map((p) => [p.name, p.access])).toEqual([
      ["Size", "read"],
      ["Mode", "read"],
    ]);
  });

  it("reads signals", () => {
    expect(iface?.signals.map(describeSignal)).toEqual(["Changed(what: as)"]);
  });

  it("treats an empty document as an empty node", () => {
    expect(parseIntrospection("  ", "/")).toEqual({ children: [], interfaces: [] });
  });

  it("fails on a bad signature", () => {
    const e = failure(`<node><interface name="a.B"><property name="P" type="a{" access="read"/></interface></node>`);
    expect(e.path).toBe("/x");
    expect(e.detail).toBe("bad signature: MalformedSignature at offset 2: unterminated dict entry");
  });

  it("fails on an invalid child name", () => {
    expect(failure(`<node><node name="a/b"/></node>`).detail).toBe("invalid child node name 'a/b'");
  });

  it("fails on a missing interface name", () => {
    expect(failure(`<node><interface/></node>`).detail).toBe("<interface> is missing its 'name' attribute");
  });
});

describe("describe", () => {
  const [iface] = parseIntrospection(DOC, "/").interfaces;

  it("formats methods", () => {
    expect(iface?.methods.map(describeMethod)).toEqual(["Lookup(key: s) => a{sv}", "Ping()"]);
  });

  it("formats properties", () => {
    expect(iface?.properties.map(describeProperty)).toEqual(["Size: t (read)", "Mode: s (read)"]);
  });
});
