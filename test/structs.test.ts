/**
 * Tests for struct definitions, instances and methods.
 */
import { describe, it, expect } from "vitest";

import { BufferHost, MemorySourceReader, RuntimeError, createInterpreter } from "../src/index";

function output(source: string): string[] {
  const host = new BufferHost();
  createInterpreter({ host, reader: new MemorySourceReader(), baseDir: "/project" }).run(source);
  return host.outputLines();
}

function runtimeError(source: string): RuntimeError {
  try {
    createInterpreter({ host: new BufferHost(), reader: new MemorySourceReader(), baseDir: "/project" }).run(source);
  } catch (e) {
    if (e instanceof RuntimeError) return e;
    throw e;
  }
  throw new Error(`expected a RuntimeError for ${source}`);
}

const POINT = `
  struct Point {
    x: 0,
    y: 0,
    sum: fn() { this.x + this.y },
    move: fn(dx, dy) {
      this.x = this.x + dx;
      this.y = this.y + dy;
      this
    }
  }
`;

describe("Struct Tests", () => {
  it("fills omitted fields from defaults", () => {
    expect(output(POINT + "let p = Point { y: 5 }; println(p.x, \",\", p.y);")).toEqual(["0,5"]);
  });

  it("prints instances with their fields in declaration order", () => {
    expect(output(POINT + "println(Point { y: 2, x: 1 });")).toEqual(["Point { x: 1, y: 2 }"]);
    expect(output("struct Empty {} println(Empty {});")).toEqual(["Empty {}"]);
  });

  it("calls methods with this bound to the receiver", () => {
    expect(output(POINT + "let p = Point { x: 3, y: 4 }; println(p.sum());")).toEqual(["7"]);
  });

  it("mutates the receiver through this", () => {
    const source =
      POINT +
      `
      let p = Point {};
      p.move(1, 2).move(10, 20);
      println(p);
    `;
    expect(output(source)).toEqual(["Point { x: 11, y: 22 }"]);
  });

  it("shares field changes between aliases", () => {
    const source =
      POINT +
      `
      let a = Point { x: 1 };
      let b = a;
      b.x = 42;
      println(a.x);
    `;
    expect(output(source)).toEqual(["42"]);
  });

  it("keeps instances independent of each other", () => {
    const source =
      POINT +
      `
      let a = Point {};
      let b = Point {};
      a.x = 5;
      println(b.x);
    `;
    expect(output(source)).toEqual(["0"]);
  });

  it("shares collection defaults between instances", () => {
    const source = `
      struct Bag { items: [] }
      let a = Bag {};
      let b = Bag {};
      push(a.items, 1);
      println(b.items);
    `;
    expect(output(source)).toEqual(["[1]"]);
  });

  it("binds this for closures created inside methods", () => {
    const source = `
      struct Counter {
        n: 0,
        incrementer: fn() { fn() { this.n = this.n + 1; } }
      }
      let c = Counter {};
      let inc = c.incrementer();
      inc();
      inc();
      println(c.n);
    `;
    expect(output(source)).toEqual(["2"]);
  });

  it("keeps methods bound when passed around", () => {
    expect(output(POINT + "let p = Point { x: 2, y: 2 }; let f = p.sum; println(f());")).toEqual(["4"]);
  });

  it("compares instances by identity", () => {
    expect(output(POINT + "let a = Point {}; let b = a; println(a == b, \" \", a == Point {});")).toEqual([
      "true false",
    ]);
  });

  it("compares bound methods by receiver and method", () => {
    const source =
      POINT +
      `
      let p = Point {};
      let q = Point {};
      let f = p.sum;
      println(p.sum == p.sum, " ", f == p.sum, " ", p.sum == q.sum, " ", p.sum == p.move, " ", Point.sum == Point.sum);
    `;
    expect(output(source)).toEqual(["true true false false true"]);
  });

  it("reflects on fields and names", () => {
    const source =
      POINT +
      `
      let p = Point { x: 7 };
      println(fields(p));
      println(name(p), " ", name(Point), " ", type(p), " ", type(Point));
      println(get_field(p, "x"));
      set_field(p, "y", 9);
      println(p.y);
    `;
    expect(output(source)).toEqual(["[x, y]", "Point Point Point Struct", "7", "9"]);
  });

  describe("errors", () => {
    it("rejects unknown fields in literals", () => {
      const err = runtimeError(POINT + "Point { z: 1 };");
      expect(err.kind).toBe("UndefinedField");
      expect(err.message).toBe("Struct Point has no field or method 'z'");
    });

    it("rejects unknown members and assignments", () => {
      expect(runtimeError(POINT + "Point {}.nope;").message).toBe("Struct Point has no field or method 'nope'");
      expect(runtimeError(POINT + "let p = Point {}; p.z = 1;").kind).toBe("UndefinedField");
      expect(runtimeError("set_field(1, \"x\", 2);").message).toBe(
        "Type mismatch in argument 1 of set_field(): expected struct instance, got Integer"
      );
    });

    it("rejects literals of things that are not structs", () => {
      expect(runtimeError("let NotAStruct = 1; NotAStruct { x: 1 };").message).toBe(
        "Type mismatch in struct literal 'NotAStruct': expected Struct, got Integer"
      );
    });

    it("rejects this in a method called without a receiver", () => {
      expect(runtimeError(POINT + "Point.sum();").message).toBe("'this' is only available inside a method");
    });
  });
});
