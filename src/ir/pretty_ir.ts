import type { IR } from '../types.js';

const TYPE_NAMES: Readonly<Record<IR.Type, string>> = {
  void: 'void',
  i32: 'i32',
  f64: 'double',
  i1: 'i1',
  ptr: 'ptr',
};

const ICMP: Readonly<Record<IR.ComparePredicate, string>> = {
  eq: 'eq',
  ne: 'ne',
  lt: 'slt',
  le: 'sle',
  gt: 'sgt',
  ge: 'sge',
};

const FCMP: Readonly<Record<IR.ComparePredicate, string>> = {
  eq: 'oeq',
  ne: 'one',
  lt: 'olt',
  le: 'ole',
  gt: 'ogt',
  ge: 'oge',
};

export function formatType(type: IR.Type): string {
  return TYPE_NAMES[type];
}

function formatFloat(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

function escapeString(value: string): string {
  let out = '';
  for (const ch of value) {
    const code = ch.charCodeAt(0);
    if (ch === '"' || ch === '\\' || code < 0x20) {
      out += `\\${code.toString(16).toUpperCase().padStart(2, '0')}`;
    } else {
      out += ch;
    }
  }
  return out;
}

class IRPrinter {
  private out: string[] = [];

  constructor(private readonly fn: IR.Function | null = null) {}

  formatModule(m: IR.Module): string {
    this.out = [`; ModuleID = '${m.name}'`];
    if (m.globals.length > 0) this.out.push('');
    for (const g of m.globals) this.out.push(this.formatGlobal(g));
    const externs = m.functions.filter(f => f.external);
    const defined = m.functions.filter(f => !f.external);
    if (externs.length > 0) this.out.push('');
    for (const f of externs) this.out.push(this.formatDeclaration(f));
    for (const f of defined) {
      this.out.push('');
      this.out.push(new IRPrinter(f).formatFunction());
    }
    return this.out.join('\n') + '\n';
  }

  formatGlobal(g: IR.Global): string {
    return `@${g.name} = global ${formatType(g.type)} ${this.formatValue(g.initializer)}`;
  }

  formatDeclaration(f: IR.Function): string {
    const params = f.params.map(p => formatType(p.type));
    if (f.variadic) params.push('...');
    return `declare ${formatType(f.returnType)} @${f.name}(${params.join(', ')})`;
  }

  formatFunction(): string {
    const f = this.requireFunction();
    const params = f.params.map(p => `${formatType(p.type)} %${p.name}`).join(', ');
    const lines = [`define ${formatType(f.returnType)} @${f.name}(${params}) {`];
    for (const block of f.blocks) {
      lines.push(`${block.label}:`);
      for (const inst of block.instructions) lines.push(`  ${this.formatInstruction(inst)}`);
    }
    lines.push('}');
    return lines.join('\n');
  }

  private requireFunction(): IR.Function {
    if (!this.fn) throw new Error('printer has no function');
    return this.fn;
  }

  private slotName(id: number): string {
    const slot = this.requireFunction().slots[id];
    return slot ? `%${slot.name}.addr` : `%slot${id}`;
  }

  private slotType(id: number): IR.Type {
    return this.requireFunction().slots[id]?.type ?? 'i32';
  }

  private blockLabel(id: number): string {
    const block = this.requireFunction().blocks[id];
    return `%${block ? block.label : `bb${id}`}`;
  }

  formatValue(v: IR.Value): string {
    switch (v.kind) {
      case 'ConstInt':
        return v.type === 'i1' ? (v.value !== 0 ? 'true' : 'false') : String(v.value);
      case 'ConstFloat':
        return formatFloat(v.value);
      case 'ConstString':
        return `c"${escapeString(v.value)}"`;
      case 'Param':
        return `%${v.name}`;
      case 'Temp':
        return `%${v.id}`;
      case 'Void':
        return 'void';
    }
  }

  private typed(v: IR.Value): string {
    return `${formatType(v.type)} ${this.formatValue(v)}`;
  }

  private formatUnary(inst: IR.UnaryInst): string {
    switch (inst.opcode) {
      case 'neg':
        return `%${inst.result.id} = sub ${formatType(inst.operand.type)} 0, ${this.formatValue(inst.operand)}`;
      case 'fneg':
        return `%${inst.result.id} = fneg ${this.typed(inst.operand)}`;
      case 'not':
        return `%${inst.result.id} = xor ${this.typed(inst.operand)}, true`;
    }
  }

  formatInstruction(inst: IR.Instruction): string {
    switch (inst.op) {
      case 'alloca':
        return `${this.slotName(inst.slot)} = alloca ${formatType(inst.type)}`;
      case 'load':
        return `%${inst.result.id} = load ${formatType(this.slotType(inst.slot))}, ptr ${this.slotName(inst.slot)}`;
      case 'store':
        return `store ${this.typed(inst.value)}, ptr ${this.slotName(inst.slot)}`;
      case 'gload':
        return `%${inst.result.id} = load ${formatType(inst.result.type)}, ptr @${inst.global}`;
      case 'gstore':
        return `store ${this.typed(inst.value)}, ptr @${inst.global}`;
      case 'binary':
        return `%${inst.result.id} = ${inst.opcode} ${this.typed(inst.lhs)}, ${this.formatValue(inst.rhs)}`;
      case 'icmp':
        return `%${inst.result.id} = icmp ${ICMP[inst.predicate]} ${this.typed(inst.lhs)}, ${this.formatValue(inst.rhs)}`;
      case 'fcmp':
        return `%${inst.result.id} = fcmp ${FCMP[inst.predicate]} ${this.typed(inst.lhs)}, ${this.formatValue(inst.rhs)}`;
      case 'unary':
        return this.formatUnary(inst);
      case 'cast':
        return `%${inst.result.id} = ${inst.opcode} ${this.typed(inst.value)} to ${formatType(inst.result.type)}`;
      case 'call': {
        const args = inst.args.map(a => this.typed(a)).join(', ');
        const call = `call ${formatType(inst.returnType)} @${inst.callee}(${args})`;
        return inst.result ? `%${inst.result.id} = ${call}` : call;
      }
      case 'br':
        return `br label ${this.blockLabel(inst.target)}`;
      case 'condbr':
        return `br ${this.typed(inst.condition)}, label ${this.blockLabel(inst.ifTrue)}, label ${this.blockLabel(inst.ifFalse)}`;
      case 'ret':
        return inst.value ? `ret ${this.typed(inst.value)}` : 'ret void';
    }
  }
}

/**
 * 将 IR 模块渲染为类 LLVM 的文本形式。
 */
export function formatModule(m: IR.Module): string {
  return new IRPrinter().formatModule(m);
}

export function formatFunction(fn: IR.Function): string {
  return fn.external ? new IRPrinter().formatDeclaration(fn) : new IRPrinter(fn).formatFunction();
}
