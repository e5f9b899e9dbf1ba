import type { ReactionTemplate, TemplateTerm } from 'types';

export interface MoleculeWriterOptions {
  comment?: string;
  /** Reacting atoms, listed in the comment line as local ids. */
  initiatorIds?: readonly number[];
}

function termSection(name: string, terms: readonly TemplateTerm[]): string[] {
  if (terms.length === 0) return [];
  return ['', name, '', ...terms.map((term, index) => `${index + 1} ${term.type} ${term.atoms.join(' ')}`)];
}

/**
 * Render a reaction template as a molecule file: comment, counts, then the
 * Coords, Types and Charges sections keyed by local atom id, followed by
 * whichever of Bonds, Angles, Dihedrals and Impropers the template has.
 */
export function writeMoleculeTemplate(template: ReactionTemplate, options: MoleculeWriterOptions = {}): string {
  let comment = options.comment ?? `${template.side}-reaction template generated by reactmap`;
  if (options.initiatorIds && options.initiatorIds.length > 0) {
    comment += `, initiator atoms ${options.initiatorIds.join(' ')}`;
  }

  const lines = [`# ${comment}`, '', `${template.atoms.length} atoms`];
  if (template.bonds.length > 0) lines.push(`${template.bonds.length} bonds`);
  if (template.angles.length > 0) lines.push(`${template.angles.length} angles`);
  if (template.dihedrals.length > 0) lines.push(`${template.dihedrals.length} dihedrals`);
  if (template.impropers.length > 0) lines.push(`${template.impropers.length} impropers`);

  lines.push('', 'Coords', '');
  for (const atom of template.atoms) {
    const [x, y, z] = atom.position;
    lines.push(`${atom.localId} ${x} ${y} ${z}`);
  }

  lines.push('', 'Types', '');
  for (const atom of template.atoms) lines.push(`${atom.localId} ${atom.type}`);

  lines.push('', 'Charges', '');
  for (const atom of template.atoms) lines.push(`${atom.localId} ${atom.charge}`);

  if (template.bonds.length > 0) {
    lines.push('', 'Bonds', '');
    template.bonds.forEach((bond, index) => {
      lines.push(`${index + 1} ${bond.type} ${bond.atom1} ${bond.atom2}`);
    });
  }
  lines.push(
    ...termSection('Angles', template.angles),
    ...termSection('Dihedrals', template.dihedrals),
    ...termSection('Impropers', template.impropers)
  );

  return lines.join('\n') + '\n';
}
