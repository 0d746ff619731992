import { resolve } from 'node:path';
import { loadCatalogue } from '../orchestration-core/L2/CapabilityCatalogue.js';
import type { Catalogue } from '../orchestration-core/L2/CapabilityCatalogue.js';
import type { PlanStep } from '../orchestration-core/L6/Oracle.js';

export const PROTEIN_MD_CATALOGUE = resolve(__dirname, '../../catalogues/protein-md.json');

/** Static declaration of the protein MD pipeline stages. */
export function loadProteinMdCatalogue(path: string = PROTEIN_MD_CATALOGUE): Catalogue {
    return loadCatalogue(path);
}

/**
 * Canonical stage order for a single structure, for use with PlanOracle.
 */
export function proteinMdPlan(pdbId: string): PlanStep[] {
    const raw = `${pdbId}.pdb`;
    const clean = `${pdbId}_clean.pdb`;
    return [
        { capabilityName: 'download_pdb_structure', args: { pdb_id: pdbId } },
        { capabilityName: 'validate_structure', args: { pdb_file: raw } },
        { capabilityName: 'remove_water_and_ligands', args: { pdb_file: raw, output_file: clean } },
        { capabilityName: 'validate_forcefield_coverage', args: { pdb_file: clean, forcefield_name: 'amber14-all.xml' } },
        { capabilityName: 'create_protein_system', args: { pdb_file: clean, forcefield_files: ['amber14-all.xml', 'amber14/tip3pfb.xml'] } },
        { capabilityName: 'run_simulation', args: { system_file: `${pdbId}_system.xml`, steps: 500_000 } },
        { capabilityName: 'analyze_trajectory', args: { trajectory_file: `${pdbId}_traj.dcd`, topology_file: clean } }
    ];
}
