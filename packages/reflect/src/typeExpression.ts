import { UNIT_SHAPE, isPrimitiveName, primitiveShape } from "@scale-kit/codec";
import type { CodecShape } from "@scale-kit/codec";
import { ScaleParseError } from "./errors";

type TokenKind = "ident" | "number" | "punct";

interface Token {
  kind: TokenKind;
  text: string;
  position: number;
}

const PUNCTUATION = ["::", "<", ">", "(", ")", "[", "]", ";", ","];

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let position = 0;

  while (position < source.length) {
    const char = source[position];
    if (/\s/.test(char)) {
      position++;
      continue;
    }
    const ident = /^[A-Za-z_][A-Za-z0-9_]*/.exec(source.slice(position));
    if (ident) {
      tokens.push({ kind: "ident", text: ident[0], position });
      position += ident[0].length;
      continue;
    }
    const number = /^[0-9][0-9_]*/.exec(source.slice(position));
    if (number) {
      tokens.push({ kind: "number", text: number[0].replace(/_/g, ""), position });
      position += number[0].length;
      continue;
    }
    const punct = PUNCTUATION.find((candidate) => source.startsWith(candidate, position));
    if (!punct) {
      throw new ScaleParseError(`Unexpected character '${char}' in type expression '${source}'`, {
        expression: source,
        position,
      });
    }
    tokens.push({ kind: "punct", text: punct, position });
    position += punct.length;
  }

  return tokens;
}

/** A generic argument: a type, or a bare integer as in `BoundedVec<u8, 32>`. */
type TypeArgument = { kind: "type"; shape: CodecShape } | { kind: "number"; value: number };

class ExpressionParser {
  private readonly tokens: Token[];
  private index = 0;

  constructor(
    private readonly source: string,
    private readonly params: ReadonlySet<string>,
  ) {
    this.tokens = tokenize(source);
  }

  parse(): CodecShape {
    const shape = this.parseType();
    const extra = this.peek();
    if (extra) {
      throw this.error(`Unexpected '${extra.text}' after type`, extra);
    }
    return shape;
  }

  private parseType(): CodecShape {
    const token = this.peek();
    if (!token) {
      throw this.error("Unexpected end of type expression");
    }
    if (token.text === "(") return this.parseTuple();
    if (token.text === "[") return this.parseArray();
    if (token.kind === "ident") return this.parsePath();
    throw this.error(`Unexpected '${token.text}'`, token);
  }

  private parseTuple(): CodecShape {
    this.expect("(");
    const elements: CodecShape[] = [];
    let trailingComma = false;
    while (!this.accept(")")) {
      elements.push(this.parseType());
      trailingComma = this.accept(",");
      if (!trailingComma) {
        this.expect(")");
        break;
      }
    }
    // `(T)` is just `T`; `(T,)` is a one-element tuple.
    if (elements.length === 1 && !trailingComma) return elements[0];
    return elements.length === 0 ? UNIT_SHAPE : { kind: "tuple", elements };
  }

  private parseArray(): CodecShape {
    this.expect("[");
    const element = this.parseType();
    this.expect(";");
    const length = this.expectNumber();
    this.expect("]");
    return { kind: "fixed-array", element, length };
  }

  private parsePath(): CodecShape {
    let name = this.expectIdent();
    // Module paths such as `gear_core::ids::ActorId` resolve by their last segment.
    while (this.accept("::")) {
      name = this.expectIdent();
    }
    const args: TypeArgument[] = [];
    if (this.accept("<")) {
      do {
        args.push(this.parseArgument());
      } while (this.accept(","));
      this.expect(">");
    }
    return this.resolveName(name, args);
  }

  private parseArgument(): TypeArgument {
    const token = this.peek();
    if (token?.kind === "number") {
      return { kind: "number", value: this.expectNumber() };
    }
    return { kind: "type", shape: this.parseType() };
  }

  private resolveName(name: string, args: TypeArgument[]): CodecShape {
    if (this.params.has(name)) {
      this.arity(name, args, 0);
      return { kind: "param", name };
    }
    if (isPrimitiveName(name)) {
      this.arity(name, args, 0);
      return primitiveShape(name);
    }

    switch (name) {
      case "str":
      case "String":
        this.arity(name, args, 0);
        return { kind: "str" };
      case "Vec":
      case "VecDeque":
      case "BTreeSet":
        return { kind: "sequence", element: this.typeArg(name, args, 0, 1) };
      case "BTreeMap":
      case "KeyedVec":
        return {
          kind: "sequence",
          element: { kind: "tuple", elements: [this.typeArg(name, args, 0, 2), this.typeArg(name, args, 1, 2)] },
        };
      case "BoundedVec":
      case "WeakBoundedVec":
      case "BoundedBTreeSet": {
        const element = this.typeArg(name, args, 0, 2, 1);
        const bound = args[1]?.kind === "number" ? args[1].value : undefined;
        return bound === undefined ? { kind: "sequence", element } : { kind: "sequence", element, bound };
      }
      case "Option":
        return { kind: "option", inner: this.typeArg(name, args, 0, 1) };
      case "Result":
        return { kind: "result", ok: this.typeArg(name, args, 0, 2), err: this.typeArg(name, args, 1, 2) };
      case "Compact":
        return { kind: "compact", inner: this.typeArg(name, args, 0, 1) };
      case "Box":
        return this.typeArg(name, args, 0, 1);
      case "PhantomData":
        return UNIT_SHAPE;
      default:
        return { kind: "type-ref", name, args: args.map((arg) => this.asType(name, arg)) };
    }
  }

  private typeArg(name: string, args: TypeArgument[], position: number, max: number, min = max): CodecShape {
    if (args.length < min || args.length > max) {
      const expected = min === max ? `${max}` : `${min} to ${max}`;
      throw new ScaleParseError(`'${name}' takes ${expected} type arguments, got ${args.length}`, {
        expression: this.source,
      });
    }
    return this.asType(name, args[position]);
  }

  private asType(name: string, arg: TypeArgument): CodecShape {
    if (arg.kind === "number") {
      throw new ScaleParseError(`'${name}' does not take a numeric argument`, { expression: this.source });
    }
    return arg.shape;
  }

  private arity(name: string, args: TypeArgument[], expected: number) {
    if (args.length !== expected) {
      throw new ScaleParseError(`'${name}' takes ${expected} type arguments, got ${args.length}`, {
        expression: this.source,
      });
    }
  }

  private peek(): Token | undefined {
    return this.tokens[this.index];
  }

  private accept(text: string): boolean {
    if (this.peek()?.text === text) {
      this.index++;
      return true;
    }
    return false;
  }

  private expect(text: string) {
    if (!this.accept(text)) {
      throw this.error(`Expected '${text}'`, this.peek());
    }
  }

  private expectIdent(): string {
    const token = this.peek();
    if (token?.kind !== "ident") {
      throw this.error("Expected a type name", token);
    }
    this.index++;
    return token.text;
  }

  private expectNumber(): number {
    const token = this.peek();
    if (token?.kind !== "number") {
      throw this.error("Expected an integer", token);
    }
    this.index++;
    const value = Number(token.text);
    if (!Number.isSafeInteger(value)) {
      throw this.error(`Integer '${token.text}' is out of range`, token);
    }
    return value;
  }

  private error(message: string, token?: Token): ScaleParseError {
    return new ScaleParseError(`${message} in type expression '${this.source}'`, {
      expression: this.source,
      position: token?.position ?? this.source.length,
    });
  }
}

/**
 * Parses a textual type such as `Option<GasNode<H256, u128>>` into a shape.
 * Names listed in `params` become generic parameters; any other unknown name
 * becomes a reference to be resolved through a registry.
 */
export function parseTypeExpression(source: string, params: Iterable<string> = []): CodecShape {
  return new ExpressionParser(source, new Set(params)).parse();
}

/** Names that `parseTypeExpression` resolves itself and a registry may not redefine. */
export const BUILTIN_TYPE_NAMES: ReadonlySet<string> = new Set([
  "bool",
  "u8",
  "u16",
  "u32",
  "u64",
  "u128",
  "i8",
  "i16",
  "i32",
  "i64",
  "i128",
  "str",
  "String",
  "Vec",
  "VecDeque",
  "BTreeSet",
  "BTreeMap",
  "KeyedVec",
  "BoundedVec",
  "WeakBoundedVec",
  "BoundedBTreeSet",
  "Option",
  "Result",
  "Compact",
  "Box",
  "PhantomData",
]);
