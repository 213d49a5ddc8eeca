/**
 * LIR text format printer. The output is accepted back by `readLir`.
 */

import type {
  LirBlock,
  LirConstant,
  LirExtern,
  LirFunction,
  LirGlobal,
  LirInst,
  LirModule,
  LirNode,
  LirPhi,
  LirTerminator,
  LirType,
  LirTypeDecl,
} from "./lir-types.ts";

export function printLir(module: LirModule): string {
  const lines: string[] = [];

  lines.push(`module ${module.name}`);

  for (const td of module.types) {
    lines.push("");
    lines.push(printTypeDecl(td));
  }

  for (const ext of module.externs) {
    lines.push("");
    lines.push(printExtern(ext));
  }

  for (const g of module.globals) {
    lines.push("");
    lines.push(printGlobal(g));
  }

  for (const c of module.constants) {
    lines.push("");
    lines.push(printConstant(c));
  }

  for (const fn of module.functions) {
    lines.push("");
    lines.push(printFunction(fn));
  }

  return `${lines.join("\n")}\n`;
}

function printTypeDecl(td: LirTypeDecl): string {
  const fields = td.type.fields.map((f) => `  ${f.name}: ${printType(f.type)}`).join("\n");
  return fields.length > 0 ? `type ${td.name} = struct {\n${fields}\n}` : `type ${td.name} = struct {}`;
}

function printAttributes(attributes: string[]): string {
  return attributes.map((a) => ` #${a}`).join("");
}

function printExtern(ext: LirExtern): string {
  const params = ext.params.map((p) => `${p.name}: ${printType(p.type)}`).join(", ");
  return `extern fn ${ext.name}(${params}): ${printType(ext.returnType)}${printAttributes(ext.attributes)}`;
}

function printGlobal(g: LirGlobal): string {
  const space = g.space ? ` #${g.space}` : "";
  return `global ${g.name}: ${printType(g.type)}${space}`;
}

function printConstant(c: LirConstant): string {
  const expr = c.expr;
  switch (expr.kind) {
    case "field_ptr":
      return `const @${c.name} = field_ptr ${printType(expr.type)}, ${expr.base}, "${expr.field}"`;
    case "index_ptr": {
      const inbounds = expr.inbounds ? "inbounds " : "";
      return `const @${c.name} = index_ptr ${inbounds}${printType(expr.type)}, ${expr.base}, ${expr.index}`;
    }
    case "cast":
      return `const @${c.name} = cast ${expr.value}, ${printType(expr.targetType)}`;
  }
}

export function printFunction(fn: LirFunction): string {
  const params = fn.params.map((p) => `%${p.name}: ${printType(p.type)}`).join(", ");
  const lines: string[] = [];
  lines.push(`fn ${fn.name}(${params}): ${printType(fn.returnType)}${printAttributes(fn.attributes)} {`);

  for (const block of fn.blocks) {
    lines.push(printBlock(block));
  }

  lines.push("}");
  return lines.join("\n");
}

export function printBlock(block: LirBlock): string {
  const lines: string[] = [];
  lines.push(`${block.id}:`);

  for (const phi of block.phis) {
    lines.push(`  ${printPhi(phi)}`);
  }

  for (const inst of block.instructions) {
    lines.push(`  ${printInst(inst)}`);
  }

  lines.push(`  ${printTerminator(block.terminator)}`);

  return lines.join("\n");
}

/** One-line rendering of any node, as it appears inside a block. */
export function printNode(node: LirNode): string {
  switch (node.kind) {
    case "phi":
      return printPhi(node);
    case "ret":
    case "ret_void":
    case "jump":
    case "br":
    case "switch":
    case "unreachable":
      return printTerminator(node);
    default:
      return printInst(node);
  }
}

function printPhi(phi: LirPhi): string {
  const incoming = phi.incoming.map((e) => `${e.value} from ${e.from}`).join(", ");
  return `${phi.dest} = φ ${printType(phi.type)} [${incoming}]`;
}

function printCall(func: string, args: string[]): string {
  return `${func}(${args.join(", ")})`;
}

function printInst(inst: LirInst): string {
  switch (inst.kind) {
    case "stack_alloc":
      return `${inst.dest} = stack_alloc ${printType(inst.type)}`;
    case "load":
      return `${inst.dest} = load ${printType(inst.type)}, ${inst.ptr}`;
    case "store":
      return `store ${inst.ptr}, ${inst.value}`;
    case "field_ptr":
      return `${inst.dest} = field_ptr ${printType(inst.type)}, ${inst.base}, "${inst.field}"`;
    case "index_ptr": {
      const inbounds = inst.inbounds ? "inbounds " : "";
      return `${inst.dest} = index_ptr ${inbounds}${printType(inst.type)}, ${inst.base}, ${inst.index}`;
    }
    case "bin_op":
      return `${inst.dest} = ${inst.op} ${printType(inst.type)} ${inst.lhs}, ${inst.rhs}`;
    case "neg":
      return `${inst.dest} = neg ${printType(inst.type)} ${inst.operand}`;
    case "not":
      return `${inst.dest} = not ${inst.operand}`;
    case "bit_not":
      return `${inst.dest} = bit_not ${printType(inst.type)} ${inst.operand}`;
    case "const_int":
      return `${inst.dest} = const_int ${printType(inst.type)} ${inst.value}`;
    case "const_float":
      return `${inst.dest} = const_float ${printType(inst.type)} ${inst.value}`;
    case "const_bool":
      return `${inst.dest} = const_bool ${inst.value}`;
    case "const_null":
      return `${inst.dest} = const_null ${printType(inst.type)}`;
    case "call":
      return `${inst.dest} = call ${printType(inst.type)} ${printCall(inst.func, inst.args)}`;
    case "call_void":
      return `call_void ${printCall(inst.func, inst.args)}`;
    case "call_extern":
      return `${inst.dest} = call_extern ${printType(inst.type)} ${printCall(inst.func, inst.args)}`;
    case "call_extern_void":
      return `call_extern_void ${printCall(inst.func, inst.args)}`;
    case "cast":
      return `${inst.dest} = cast ${inst.value}, ${printType(inst.targetType)}`;
    case "sizeof":
      return `${inst.dest} = sizeof ${printType(inst.type)}`;
    case "null_check":
      return `null_check ${inst.ptr}`;
    case "assert_check":
      return `assert_check ${inst.cond}, "${inst.message}"`;
  }
}

function printTerminator(term: LirTerminator): string {
  switch (term.kind) {
    case "ret":
      return `ret ${term.value}`;
    case "ret_void":
      return "ret_void";
    case "jump":
      return `jump ${term.target}`;
    case "br":
      return `br ${term.cond}, ${term.thenBlock}, ${term.elseBlock}`;
    case "switch": {
      const cases = term.cases.map((c) => `${c.value} → ${c.target}`).join(", ");
      return `switch ${term.value}, [${cases}], default: ${term.defaultBlock}`;
    }
    case "unreachable":
      return "unreachable";
  }
}

export function printType(t: LirType): string {
  switch (t.kind) {
    case "int": {
      const prefix = t.signed ? "i" : "u";
      return `${prefix}${t.bits}`;
    }
    case "float":
      return `f${t.bits}`;
    case "bool":
      return "bool";
    case "void":
      return "void";
    case "ptr": {
      const prefix = t.space === "global" ? "gptr" : t.space === "symmetric" ? "sptr" : "ptr";
      return `${prefix}<${printType(t.pointee)}>`;
    }
    case "struct":
      return t.name;
    case "array":
      return `array<${printType(t.element)}, ${t.length}>`;
    case "function": {
      const params = t.params.map(printType).join(", ");
      return `fn(${params}): ${printType(t.returnType)}`;
    }
  }
}
