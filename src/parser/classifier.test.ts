import { describe, it, expect } from "vitest";
import {
  blankTrivia,
  classifyDirective,
  classifyStatement,
  decideBrace,
  isTypeHead,
} from "./classifier";

function definition(src: string) {
  const brace = src.indexOf("{");
  const close = src.lastIndexOf("}");
  return classifyStatement({
    head: blankTrivia(src, 0, brace),
    raw: src,
    hasBody: true,
    trailer: blankTrivia(src, close + 1, src.length),
  });
}

function declaration(src: string, container?: string) {
  return classifyStatement({
    head: blankTrivia(src, 0, src.length),
    raw: src,
    hasBody: false,
    container,
  });
}

describe("blankTrivia", () => {
  it("keeps length, blanks comments and literal contents", () => {
    const src = 'f("{") // }';
    const blanked = blankTrivia(src, 0, src.length);
    expect(blanked).toBe('f(" ")     ');
    expect(blanked).toHaveLength(src.length);
  });

  it("keeps newlines inside blanked ranges", () => {
    expect(blankTrivia("/* a\nb */x", 0, 10)).toBe("    \n    x");
  });
});

describe("decideBrace", () => {
  it("treats initializers as inline braces", () => {
    expect(decideBrace("int a[] = ")).toBe("inline");
  });

  it("treats braced member initializers as inline", () => {
    expect(decideBrace("Foo::Foo(int x) : a_(x), b_")).toBe("inline");
  });

  it("opens a body after a constructor initializer list", () => {
    expect(decideBrace("Foo::Foo(int x) : a_(x) ")).toBe("body");
  });

  it("ignores the = of operator names", () => {
    expect(decideBrace("bool operator==(const A& o) const ")).toBe("body");
  });

  it("opens bodies for functions and types", () => {
    expect(decideBrace("void f() ")).toBe("body");
    expect(decideBrace("class Foo : public Bar ")).toBe("body");
  });
});

describe("isTypeHead", () => {
  it("recognizes class, struct and enum heads", () => {
    expect(isTypeHead("template <typename T> class Foo ")).toBe(true);
    expect(isTypeHead("enum class Color : int ")).toBe(true);
  });

  it("rejects functions returning a struct", () => {
    expect(isTypeHead("struct Foo* make() ")).toBe(false);
    expect(isTypeHead("void f() ")).toBe(false);
  });
});

describe("classifyStatement", () => {
  describe("namespaces", () => {
    it("names nested namespaces", () => {
      expect(definition("namespace a::b { }")).toEqual({
        kind: "namespace",
        name: "a::b",
      });
    });

    it("leaves anonymous namespaces unnamed", () => {
      expect(definition("namespace { }")).toEqual({ kind: "namespace" });
    });

    it("accepts inline namespaces", () => {
      expect(definition("inline namespace v1 { }")).toEqual({
        kind: "namespace",
        name: "v1",
      });
    });
  });

  describe("types", () => {
    it("skips template prefix, export macro, final and bases", () => {
      const src =
        "template <typename T>\nclass JSON_API Value final : public Base<T> { };";
      expect(definition(src)).toEqual({ kind: "class", name: "Value" });
    });

    it("names anonymous typedef structs after the alias", () => {
      expect(definition("typedef struct { int x; } Point;")).toEqual({
        kind: "struct",
        name: "Point",
      });
    });

    it("reports unions as structs", () => {
      expect(definition("union U { int a; float b; };")).toEqual({
        kind: "struct",
        name: "U",
      });
    });

    it("does not recognize enums", () => {
      expect(definition("enum Color { Red };")).toBeNull();
    });

    it("does not recognize forward declarations", () => {
      expect(declaration("class Forward;")).toBeNull();
      expect(declaration("friend class Helper;")).toBeNull();
    });
  });

  describe("function definitions", () => {
    it("keeps qualified names", () => {
      expect(definition("int Foo::bar(int x) const { return x; }")).toEqual({
        kind: "function",
        name: "Foo::bar",
      });
    });

    it("keeps destructor tildes", () => {
      expect(definition("Foo::~Foo() { }")).toEqual({
        kind: "function",
        name: "Foo::~Foo",
      });
    });

    it("names operators", () => {
      expect(
        definition("bool operator==(const A& a, const A& b) { return true; }"),
      ).toEqual({ kind: "function", name: "operator==" });
      expect(definition("void Widget::operator()(int x) { }")).toEqual({
        kind: "function",
        name: "Widget::operator()",
      });
    });

    it("rejects control statements and macro invocations", () => {
      expect(definition("if (x) { }")).toBeNull();
      expect(definition("TEST(Suite, Name) { }")).toBeNull();
    });
  });

  describe("prototypes", () => {
    it("recognizes plain and qualified prototypes", () => {
      expect(declaration("void f();")).toEqual({ kind: "function", name: "f" });
      expect(declaration("virtual int size() const override;")).toEqual({
        kind: "function",
        name: "size",
      });
      expect(declaration("Foo(int a, int b) = default;")).toEqual({
        kind: "function",
        name: "Foo",
      });
    });

    it("rejects variables initialized by calls", () => {
      expect(declaration("int x = compute(3);")).toBeNull();
      expect(declaration('std::string s("abc");')).toBeNull();
    });

    it("rejects macro invocations", () => {
      expect(declaration("DECLARE_THING(widget);")).toBeNull();
      expect(declaration("RGB(int r);", "Color")).toBeNull();
    });

    it("accepts constructors of all-caps types", () => {
      expect(declaration("RGB(int r);", "RGB")).toEqual({ kind: "function", name: "RGB" });
      expect(declaration("A() = default;", "A")).toEqual({ kind: "function", name: "A" });
    });
  });

  describe("aliases and imports", () => {
    it("names using directives and aliases", () => {
      expect(declaration("using namespace std;")).toEqual({
        kind: "using",
        name: "std",
      });
      expect(declaration("using Callback = std::function<void(int)>;")).toEqual({
        kind: "using",
        name: "Callback",
      });
      expect(declaration("namespace fs = std::filesystem;")).toEqual({
        kind: "using",
        name: "fs",
      });
    });

    it("names typedefs", () => {
      expect(declaration("typedef unsigned long size_type;")).toEqual({
        kind: "using",
        name: "size_type",
      });
      expect(declaration("typedef void (*Handler)(int);")).toEqual({
        kind: "using",
        name: "Handler",
      });
    });

    it("treats module imports as includes", () => {
      expect(declaration("import std.core;")).toEqual({
        kind: "include",
        name: "std.core",
      });
    });
  });
});

describe("classifyDirective", () => {
  it("names include targets", () => {
    expect(classifyDirective("#include <vector>")).toEqual({
      kind: "include",
      name: "<vector>",
    });
    expect(classifyDirective('#  include "a/b.h"')).toEqual({
      kind: "include",
      name: '"a/b.h"',
    });
  });

  it("leaves other directives as nameless macros", () => {
    expect(classifyDirective("#define X 1")).toEqual({ kind: "macro" });
    expect(classifyDirective("#pragma once")).toEqual({ kind: "macro" });
  });
});
