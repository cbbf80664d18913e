/**
 * @module target-validator
 *
 * 赋值、复合赋值、自增/自减目标与 delete 操作数的合法性判定。
 *
 * 判定结果是纯值；由构建器通过诊断收集器记录。
 */

import { DiagnosticCode } from '../diagnostics/diagnostics.js';
import type { Node, Position } from '../types.js';

export type TargetOperation = 'assign' | 'compound-assign' | 'increment' | 'decrement';

export type TargetVerdict =
  | { readonly ok: true }
  | {
      readonly ok: false;
      readonly code: DiagnosticCode;
      readonly message: string;
      readonly position: Position | null;
    };

const OK: TargetVerdict = Object.freeze({ ok: true });

function reject(code: DiagnosticCode, message: string, target: Node): TargetVerdict {
  return { ok: false, code, message, position: target.position };
}

/** 可修改的引用：名称、非可选链的属性访问 */
function isReference(node: Node): boolean {
  switch (node.kind) {
    case 'Name':
      return true;
    case 'GetProp':
    case 'GetElem':
      return !node.optional && !isOptionalChain(node.children[0]);
    default:
      return false;
  }
}

function isOptionalChain(node: Node | undefined): boolean {
  if (node === undefined) return false;
  switch (node.kind) {
    case 'GetProp':
    case 'GetElem':
    case 'Call':
      return node.optional || isOptionalChain(node.children[0]);
    default:
      return false;
  }
}

export function validateTarget(target: Node, operation: TargetOperation): TargetVerdict {
  if (isReference(target)) return OK;

  switch (operation) {
    case 'assign':
      if (target.kind === 'ArrayPattern' || target.kind === 'ObjectPattern') return OK;
      return reject(DiagnosticCode.S001_InvalidAssignmentTarget, 'invalid assignment target', target);
    case 'compound-assign':
      return reject(DiagnosticCode.S001_InvalidAssignmentTarget, 'invalid assignment target', target);
    case 'increment':
    case 'decrement':
      if (target.kind === 'Call') {
        return reject(DiagnosticCode.S002_InvalidUpdateTarget, `invalid ${operation} target`, target);
      }
      return reject(
        DiagnosticCode.S003_InvalidUpdateOperand,
        `Invalid ${operation} operand`,
        target
      );
  }
}

export function validateDeleteOperand(operand: Node, strict: boolean): TargetVerdict {
  switch (operand.kind) {
    case 'GetProp':
    case 'GetElem':
      return OK;
    case 'Name':
      if (!strict) return OK;
      break;
    default:
      break;
  }
  return reject(
    DiagnosticCode.S004_InvalidDeleteOperand,
    'Invalid delete operand. Only properties can be deleted.',
    operand
  );
}
