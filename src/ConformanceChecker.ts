import { FragmentNode, FragmentReader, ElementLocation } from './Fragment';
import { EXTENSION_TYPES, ExtensionTypeRules, isExtensionTypeName } from './ExtensionTypes';
import { UnknownTypeError } from './errors';

export type ViolationKind =
  | 'FixedValueMismatch'
  | 'ExclusiveChoiceViolated'
  | 'CardinalityViolated'
  | 'UndeclaredContent';

export interface Violation {
  kind: ViolationKind;
  message: string;
  path: string;
  location?: ElementLocation;
  attribute?: string;
  element?: string;
  expected?: string[];
  actual?: string | null;
}

export interface Verdict {
  ok: boolean;
  violations: Violation[];
}

export interface CheckOptions {
  /** Reject child content the restriction does not re-permit (strict derivation reading) */
  strict?: boolean;
}

// Attribute checks sort ahead of child-structure checks on the same node
enum RulePrecedence {
  Attribute = 0,
  ChildStructure = 1
}

interface PendingViolation {
  violation: Violation;
  position: number;
  precedence: RulePrecedence;
  sequence: number;
}

interface NodeRef {
  node: FragmentNode;
  path: string;
  position: number;
}

type Report = (violation: Violation, at: NodeRef, precedence: RulePrecedence) => void;

/**
 * Checks fragments against the closed set of extension types.
 * Stateless: every call to check() is independent.
 */
export class ExtensionConformanceChecker {
  private readonly strict: boolean;

  constructor(options: CheckOptions = {}) {
    this.strict = options.strict ?? false;
  }

  /**
   * Check a fragment against one extension type, collecting every violation found
   * @throws UnknownTypeError when typeName is not one of the declared extension types
   * @throws MalformedInputError when the fragment is not a tree
   */
  public check(fragment: FragmentNode, typeName: string): Verdict {
    if (!isExtensionTypeName(typeName)) {
      throw new UnknownTypeError(typeName);
    }
    FragmentReader.assertTree(fragment);

    const rules = EXTENSION_TYPES[typeName];
    const root: NodeRef = { node: fragment, path: `/${fragment.name}`, position: 0 };
    const children = this.indexChildren(root);
    const pending: PendingViolation[] = [];
    const report: Report = (violation, at, precedence) => {
      pending.push({ violation, position: at.position, precedence, sequence: pending.length });
    };

    this.checkFixedAttributes(rules, root, report);
    this.checkChoices(rules, root, children, report);
    this.checkCardinalities(rules, children, report);
    if (this.strict) {
      this.checkDeclaredContent(rules, children, report);
    }

    pending.sort((a, b) => a.position - b.position || a.precedence - b.precedence || a.sequence - b.sequence);
    const violations = pending.map(p => p.violation);
    return { ok: violations.length === 0, violations };
  }

  /**
   * Assign document-order positions to the root's element children.
   * Positions count every descendant so that siblings keep preorder distance.
   */
  private indexChildren(root: NodeRef): NodeRef[] {
    const refs: NodeRef[] = [];
    const nameCounts = new Map<string, number>();
    let position = root.position + 1;
    for (const child of root.node.children) {
      const index = (nameCounts.get(child.name) ?? 0) + 1;
      nameCounts.set(child.name, index);
      refs.push({ node: child, path: `${root.path}/${child.name}[${index}]`, position });
      position += this.countNodes(child);
    }
    return refs;
  }

  private countNodes(node: FragmentNode): number {
    let total = 0;
    const work: FragmentNode[] = [node];
    let current = work.pop();
    while (current) {
      total++;
      for (const child of current.children) {
        work.push(child);
      }
      current = work.pop();
    }
    return total;
  }

  private withLocation(violation: Violation, at: NodeRef): Violation {
    return at.node.location ? { ...violation, location: at.node.location } : violation;
  }

  private checkFixedAttributes(
    rules: ExtensionTypeRules,
    root: NodeRef,
    report: Report
  ): void {
    for (const rule of rules.fixedAttributes) {
      const actual = Object.prototype.hasOwnProperty.call(root.node.attributes, rule.name)
        ? root.node.attributes[rule.name]
        : null;
      if (actual !== null && rule.values.includes(actual)) {
        continue;
      }
      const message = actual === null
        ? `Required attribute '${rule.name}' is missing; expected ${rule.values.map(v => `'${v}'`).join(' or ')}`
        : `Attribute '${rule.name}' is '${actual}'; expected ${rule.values.map(v => `'${v}'`).join(' or ')}`;
      report(this.withLocation({
        kind: 'FixedValueMismatch',
        message,
        path: `${root.path}/@${rule.name}`,
        attribute: rule.name,
        expected: [...rule.values],
        actual
      }, root), root, RulePrecedence.Attribute);
    }
  }

  private checkChoices(
    rules: ExtensionTypeRules,
    root: NodeRef,
    children: NodeRef[],
    report: Report
  ): void {
    for (const rule of rules.choices) {
      const present = children.filter(ref => rule.members.includes(ref.node.name));
      if (present.length === 1) {
        continue;
      }
      const alternatives = rule.members.map(m => `'${m}'`).join(' or ');
      if (present.length === 0) {
        report(this.withLocation({
          kind: 'ExclusiveChoiceViolated',
          message: `Expected exactly one of ${alternatives}, found none`,
          path: root.path,
          expected: [...rule.members],
          actual: null
        }, root), root, RulePrecedence.ChildStructure);
        continue;
      }
      const extra = present[1];
      report(this.withLocation({
        kind: 'ExclusiveChoiceViolated',
        message: `Expected exactly one of ${alternatives}, found ${present.length}: ${present.map(ref => ref.node.name).join(', ')}`,
        path: extra.path,
        element: extra.node.name,
        expected: [...rule.members],
        actual: present.map(ref => ref.node.name).join(',')
      }, extra), extra, RulePrecedence.ChildStructure);
    }
  }

  private checkCardinalities(
    rules: ExtensionTypeRules,
    children: NodeRef[],
    report: Report
  ): void {
    for (const rule of rules.cardinalities) {
      const occurrences = children.filter(ref => ref.node.name === rule.element);
      if (occurrences.length <= rule.maxOccurs) {
        continue;
      }
      const surplus = occurrences[rule.maxOccurs];
      report(this.withLocation({
        kind: 'CardinalityViolated',
        message: `Element '${rule.element}' occurs ${occurrences.length} times; at most ${rule.maxOccurs} allowed`,
        path: surplus.path,
        element: rule.element,
        actual: String(occurrences.length)
      }, surplus), surplus, RulePrecedence.ChildStructure);
    }
  }

  private checkDeclaredContent(
    rules: ExtensionTypeRules,
    children: NodeRef[],
    report: Report
  ): void {
    const declared = rules.declaredContent;
    if (declared === null) {
      return;
    }
    for (const ref of children) {
      if (declared.includes(ref.node.name)) {
        continue;
      }
      report(this.withLocation({
        kind: 'UndeclaredContent',
        message: `Element '${ref.node.name}' is not permitted by ${rules.schemaType}`,
        path: ref.path,
        element: ref.node.name
      }, ref), ref, RulePrecedence.ChildStructure);
    }
  }
}
