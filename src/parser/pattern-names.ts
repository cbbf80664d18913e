/**
 * @module pattern-names
 *
 * 绑定名称提取：遍历解构模式、参数列表或声明，按从左到右的声明顺序
 * 对每个被绑定的名称调用一次 emit，不去重。
 */

import type { NameNode, Node } from '../types.js';

export function collectPatternNames(node: Node, emit: (name: NameNode) => void): void {
  switch (node.kind) {
    case 'Name':
      // 初始化表达式子节点不绑定名称
      emit(node);
      return;
    case 'ArrayPattern':
    case 'ObjectPattern':
    case 'ParamList':
    case 'Var':
    case 'Let':
    case 'Const':
      for (const child of node.children) collectPatternNames(child, emit);
      return;
    case 'StringKey':
    case 'Rest':
    case 'DefaultValue':
    case 'DestructuringLhs': {
      const target = node.children[0];
      if (target !== undefined) collectPatternNames(target, emit);
      return;
    }
    case 'ComputedProp': {
      const value = node.children[1];
      if (value !== undefined) collectPatternNames(value, emit);
      return;
    }
    default:
      return;
  }
}

export function patternNames(node: Node): NameNode[] {
  const names: NameNode[] = [];
  collectPatternNames(node, name => names.push(name));
  return names;
}
