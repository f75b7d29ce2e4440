import { TextArea } from "../src/text-area.js";
import { describe, it, expect } from "vitest";

// Small deterministic PRNG so failures reproduce from the seed alone.
function mulberry32(seed: number): () => number {
  let a = seed;
  return () => {
    a = (a + 0x6d2b79f5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/*
 * Straightforward reference buffer without a sentinel: columns range over
 * [0, length] instead of [0, cellCount).
 */
class ModelBuffer {
  lines: Array<Array<string>> = [[]];
  row = 0;
  col = 0;

  private get line(): Array<string> {
    const line = this.lines[this.row];
    if (line === undefined) {
      throw new Error(`model row ${this.row} out of range`);
    }
    return line;
  }

  private lenAt(row: number): number {
    return this.lines[row]?.length ?? 0;
  }

  insert(chars: Array<string>): void {
    this.line.splice(this.col, 0, ...chars);
    this.col += chars.length;
  }

  tab(): void {
    this.insert(Array<string>(4 - (this.col % 4)).fill(" "));
  }

  newline(): void {
    const tail = this.line.splice(this.col);
    this.lines.splice(this.row + 1, 0, tail);
    this.row += 1;
    this.col = 0;
  }

  backspace(): void {
    if (this.col > 0) {
      this.line.splice(this.col - 1, 1);
      this.col -= 1;
    } else if (this.row > 0) {
      const [cur = []] = this.lines.splice(this.row, 1);
      this.row -= 1;
      this.col = this.line.length;
      this.line.push(...cur);
    }
  }

  forward(): void {
    if (this.col < this.line.length) {
      this.col += 1;
    } else if (this.row + 1 < this.lines.length) {
      this.row += 1;
      this.col = 0;
    }
  }

  back(): void {
    if (this.col > 0) {
      this.col -= 1;
    } else if (this.row > 0) {
      this.row -= 1;
      this.col = this.line.length;
    }
  }

  vertical(delta: number): void {
    const target = this.row + delta;
    if (target < 0 || target >= this.lines.length) {
      return;
    }
    this.row = target;
    this.col = Math.min(this.col, this.lenAt(target));
  }

  text(): Array<string> {
    return this.lines.map((l) => l.join(""));
  }
}

const ALPHABET = ["a", "b", "z", " ", "é", "あ", "😀", "𝔘"];

type Op = {
  name: string;
  apply: (area: TextArea, model: ModelBuffer, rand: () => number) => void;
};

const OPS: Array<Op> = [
  {
    name: "insertChar",
    apply: (area, model, rand) => {
      const ch = ALPHABET[Math.floor(rand() * ALPHABET.length)] ?? "a";
      area.insertChar(ch);
      model.insert([ch]);
    },
  },
  {
    name: "insertText",
    apply: (area, model) => {
      area.insertText("x😀y");
      model.insert(["x", "😀", "y"]);
    },
  },
  {
    name: "insertTab",
    apply: (area, model) => {
      area.insertTab();
      model.tab();
    },
  },
  {
    name: "insertNewline",
    apply: (area, model) => {
      area.insertNewline();
      model.newline();
    },
  },
  {
    name: "deleteChar",
    apply: (area, model) => {
      area.deleteChar();
      model.backspace();
    },
  },
  {
    name: "cursorForward",
    apply: (area, model) => {
      area.cursorForward();
      model.forward();
    },
  },
  {
    name: "cursorBack",
    apply: (area, model) => {
      area.cursorBack();
      model.back();
    },
  },
  {
    name: "cursorUp",
    apply: (area, model) => {
      area.cursorUp();
      model.vertical(-1);
    },
  },
  {
    name: "cursorDown",
    apply: (area, model) => {
      area.cursorDown();
      model.vertical(1);
    },
  },
  {
    name: "cursorStart",
    apply: (area, model) => {
      area.cursorStart();
      model.col = 0;
    },
  },
  {
    name: "cursorEnd",
    apply: (area, model) => {
      area.cursorEnd();
      model.col = model.lines[model.row]?.length ?? 0;
    },
  },
];

describe("TextArea – invariants under random editing", () => {
  for (const seed of [1, 7, 42, 1234, 98765]) {
    it(`matches the reference buffer for seed ${seed}`, () => {
      const rand = mulberry32(seed);
      const area = new TextArea();
      const model = new ModelBuffer();
      const history: Array<string> = [];

      for (let step = 0; step < 400; step++) {
        const op = OPS[Math.floor(rand() * OPS.length)];
        if (op === undefined) {
          continue;
        }
        history.push(op.name);
        op.apply(area, model, rand);

        area.checkInvariants();
        expect(area.getLines(), history.join(" ")).toEqual(model.text());
        expect(area.getCursor(), history.join(" ")).toEqual([
          model.row,
          model.col,
        ]);
      }
    });
  }

  it("never exposes the sentinel through getLines", () => {
    const area = new TextArea();
    area.insertChar("a");
    area.insertNewline();
    area.insertNewline();
    area.cursorUp();
    area.cursorEnd();
    expect(area.getLines()).toEqual(["a", "", ""]);
    expect(area.getText()).toBe("a\n\n");
    for (const line of area.widget().lines) {
      const rendered = line.map((s) => s.text).join("");
      expect(rendered.endsWith(" ")).toBe(true);
    }
  });
});
