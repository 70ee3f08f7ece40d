// Low-level IR constructors and the per-function CFG builder

import type { IR } from '../types.js';

export const Values = {
  int: (value: number): IR.ConstInt => ({ kind: 'ConstInt', type: 'i32', value: value | 0 }),
  bool: (value: boolean): IR.ConstInt => ({ kind: 'ConstInt', type: 'i1', value: value ? 1 : 0 }),
  float: (value: number): IR.ConstFloat => ({ kind: 'ConstFloat', type: 'f64', value }),
  string: (value: string): IR.ConstString => ({ kind: 'ConstString', type: 'ptr', value }),
  param: (index: number, name: string, type: IR.Type): IR.Param => ({ kind: 'Param', type, index, name }),
  void: (): IR.Void => ({ kind: 'Void', type: 'void' }),
};

/** 给定类型的零值；void 没有零值 */
export function zeroValue(type: IR.Type): IR.Constant | null {
  switch (type) {
    case 'i32':
      return Values.int(0);
    case 'f64':
      return Values.float(0);
    case 'i1':
      return Values.bool(false);
    case 'ptr':
      return Values.string('');
    case 'void':
      return null;
  }
}

export function isTerminator(inst: IR.Instruction): inst is IR.Terminator {
  return inst.op === 'br' || inst.op === 'condbr' || inst.op === 'ret';
}

export function terminatorOf(block: IR.BasicBlock): IR.Terminator | null {
  const last = block.instructions[block.instructions.length - 1];
  return last && isTerminator(last) ? last : null;
}

function successorsOf(term: IR.Terminator): number[] {
  switch (term.op) {
    case 'br':
      return [term.target];
    case 'condbr':
      return term.ifTrue === term.ifFalse ? [term.ifTrue] : [term.ifTrue, term.ifFalse];
    case 'ret':
      return [];
  }
}

function remapTerminator(term: IR.Terminator, remap: (id: number) => number): IR.Terminator {
  switch (term.op) {
    case 'br':
      return { op: 'br', target: remap(term.target) };
    case 'condbr':
      return { op: 'condbr', condition: term.condition, ifTrue: remap(term.ifTrue), ifFalse: remap(term.ifFalse) };
    case 'ret':
      return term;
  }
}

/**
 * 单个函数的控制流图构建器。
 *
 * - 基本块以 id 寻址，标签在函数内唯一（`then`, `then1`, ...）
 * - 栈槽的 alloca 始终插入到入口块开头
 * - 向已终结的基本块追加指令属于内部错误
 */
export class FunctionBuilder {
  private blocks: IR.BasicBlock[] = [];
  private readonly slots: IR.Slot[] = [];
  private readonly labelCounts = new Map<string, number>();
  private readonly slotNameCounts = new Map<string, number>();
  private nextTemp = 0;
  private current: IR.BasicBlock;

  constructor(
    readonly name: string,
    readonly params: readonly IR.FunctionParam[],
    readonly returnType: IR.Type
  ) {
    this.current = this.createBlock('entry');
  }

  get entryBlock(): IR.BasicBlock {
    const entry = this.blocks[0];
    if (!entry) throw new Error(`function ${this.name} has no entry block`);
    return entry;
  }

  createBlock(label: string): IR.BasicBlock {
    const seen = this.labelCounts.get(label) ?? 0;
    this.labelCounts.set(label, seen + 1);
    const block: IR.BasicBlock = {
      id: this.blocks.length,
      label: seen === 0 ? label : `${label}${seen}`,
      instructions: [],
      successors: [],
    };
    this.blocks.push(block);
    return block;
  }

  setInsertPoint(block: IR.BasicBlock): void {
    this.current = block;
  }

  isTerminated(block: IR.BasicBlock = this.current): boolean {
    return terminatorOf(block) !== null;
  }

  /**
   * 分配一个栈槽，并在入口块的 alloca 序列末尾插入对应的 alloca。
   */
  allocateSlot(name: string, type: IR.Type): IR.Slot {
    const seen = this.slotNameCounts.get(name) ?? 0;
    this.slotNameCounts.set(name, seen + 1);
    const slot: IR.Slot = { id: this.slots.length, name: seen === 0 ? name : `${name}.${seen}`, type };
    this.slots.push(slot);

    const entry = this.entryBlock.instructions;
    let at = 0;
    while (at < entry.length && entry[at]?.op === 'alloca') at++;
    entry.splice(at, 0, { op: 'alloca', slot: slot.id, type });
    return slot;
  }

  newTemp(type: IR.Type): IR.Temp {
    return { kind: 'Temp', type, id: this.nextTemp++ };
  }

  emit(inst: IR.Instruction): void {
    if (isTerminator(inst)) {
      this.terminate(inst);
      return;
    }
    if (this.isTerminated()) {
      throw new Error(`cannot append to terminated block ${this.current.label} in ${this.name}`);
    }
    this.current.instructions.push(inst);
  }

  terminate(term: IR.Terminator): void {
    if (this.isTerminated()) {
      throw new Error(`block ${this.current.label} in ${this.name} is already terminated`);
    }
    this.current.instructions.push(term);
    this.current.successors.push(...successorsOf(term));
  }

  /**
   * 删除从入口不可达的基本块，并将剩余块按原顺序重新编号。
   */
  pruneUnreachable(): void {
    const reachable = new Set<number>([0]);
    const worklist = [0];
    while (worklist.length > 0) {
      const id = worklist.pop() ?? 0;
      for (const succ of this.blocks[id]?.successors ?? []) {
        if (!reachable.has(succ)) {
          reachable.add(succ);
          worklist.push(succ);
        }
      }
    }

    const kept = this.blocks.filter(b => reachable.has(b.id));
    const newIds = new Map<number, number>(kept.map((b, index) => [b.id, index]));
    const remap = (id: number): number => newIds.get(id) ?? id;
    const currentId = this.current.id;

    this.blocks = kept.map((b, index) => ({
      id: index,
      label: b.label,
      instructions: b.instructions.map(inst => (isTerminator(inst) ? remapTerminator(inst, remap) : inst)),
      successors: b.successors.map(remap),
    }));
    this.current = this.blocks[newIds.get(currentId) ?? 0] ?? this.entryBlock;
  }

  /** 尚未终结的基本块 */
  openBlocks(): IR.BasicBlock[] {
    return this.blocks.filter(b => !this.isTerminated(b));
  }

  build(): IR.Function {
    return {
      name: this.name,
      params: this.params,
      returnType: this.returnType,
      external: false,
      variadic: false,
      blocks: this.blocks,
      slots: this.slots,
    };
  }
}

/** 外部函数声明（内置函数与 printf） */
export function externalFunction(
  name: string,
  params: readonly IR.FunctionParam[],
  returnType: IR.Type,
  variadic = false
): IR.Function {
  return { name, params, returnType, external: true, variadic, blocks: [], slots: [] };
}
