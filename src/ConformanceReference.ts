import * as fs from 'fs';
import { ExtensionConformanceChecker, Verdict, Violation, ViolationKind, CheckOptions } from './ConformanceChecker';
import { FragmentNode, FragmentReader } from './Fragment';
import { ExtensionTypeName, SubstitutionRegistry } from './ExtensionTypes';
import { ExtensionTypeDetector } from './ExtensionTypeDetector';
import { UnknownTypeError } from './errors';

// Re-export interfaces from the checker for the public API
export type { Verdict, Violation, ViolationKind };

export type ConformanceOptions = CheckOptions;

export class ConformanceReference {
  private checker: ExtensionConformanceChecker;
  private registry: SubstitutionRegistry = new SubstitutionRegistry();
  private strict: boolean;

  constructor(options: ConformanceOptions = {}) {
    this.strict = options.strict ?? ((process.env.GEOPOS_STRICT || '').trim() === '1');
    this.checker = new ExtensionConformanceChecker({ strict: this.strict });
  }

  /**
   * Whether base-type content the restriction drops is rejected
   */
  public isStrict(): boolean {
    return this.strict;
  }

  /**
   * Check an already parsed fragment
   * @param fragment The fragment to check
   * @param typeName One of the declared extension type names
   */
  public check(fragment: FragmentNode, typeName: string): Verdict {
    return this.checker.check(fragment, typeName);
  }

  /**
   * Parse and check an XML string
   * @param xml The XML source
   * @param typeName The extension type; detected from the root element when omitted
   */
  public checkXml(xml: string, typeName?: string): Verdict {
    return this.checkFragment(FragmentReader.fromXml(xml), typeName);
  }

  /**
   * Parse and check an XML file
   * @returns The verdict, or null if the file does not exist
   */
  public checkFile(xmlFilePath: string, typeName?: string): Verdict | null {
    if (!fs.existsSync(xmlFilePath)) {
      console.warn(`XML file not found: ${xmlFilePath}`);
      return null;
    }
    return this.checkFragment(FragmentReader.fromFile(xmlFilePath), typeName);
  }

  /**
   * Get the extension types that may fill a substitution group head
   * @param base e.g. 'gml:AbstractGeometry'
   */
  public getSubstitutes(base: string): readonly ExtensionTypeName[] {
    return this.registry.resolve(base);
  }

  private checkFragment(fragment: FragmentNode, typeName?: string): Verdict {
    const resolved = typeName ?? ExtensionTypeDetector.detectTypeFromFragment(fragment).typeName;
    if (resolved === null) {
      throw new UnknownTypeError(fragment.name);
    }
    return this.checker.check(fragment, resolved);
  }

  /**
   * Render a verdict as a human-readable report
   * @param verdict The verdict to render
   * @param source Optional label (file name) for the header line
   */
  public static formatReport(verdict: Verdict, source?: string): string {
    const lines = [source ? `${verdict.ok ? 'PASS' : 'FAIL'} ${source}` : (verdict.ok ? 'PASS' : 'FAIL')];
    for (const violation of verdict.violations) {
      const where = violation.location ? ` (${violation.location.line}:${violation.location.column})` : '';
      lines.push(`  [${violation.kind}] ${violation.path}${where}: ${violation.message}`);
    }
    return lines.join('\n');
  }
}
