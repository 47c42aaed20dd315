/**
 * Small part catalog shared by storage, search and runtime tests
 */

import type { PartRecordInput } from '../../src/parts/types.js';

export const SAMPLE_PARTS: PartRecordInput[] = [
  {
    id: 'BBa_J23100',
    label: 'Anderson constitutive promoter J23100',
    description: 'Strongest member of the Anderson constitutive promoter family.',
    sequence: 'TTGACGGCTAGCTCAGTCCTAGGTACAGTGCTAGC',
    typeHierarchy: { level1: 'DNA Elements', level2: 'Regulatory' },
    sourceCollection: 'iGEM Registry',
    metadata: { organism: 'E. coli' },
    usageCount: 120,
    successRate: 0.9,
  },
  {
    id: 'BBa_B0034',
    label: 'Strong RBS B0034',
    description: 'Ribosome binding site with high translation initiation.',
    sequence: 'AAAGAGGAGAAA',
    typeHierarchy: { level1: 'DNA Elements', level2: 'RBS' },
    sourceCollection: 'igem',
    metadata: { organism: 'E. coli' },
    usageCount: 80,
    successRate: 0.85,
  },
  {
    id: 'BBa_E0040',
    label: 'GFP coding sequence',
    description: 'Green fluorescent protein reporter, mut3b variant.',
    typeHierarchy: { level1: 'Coding', level2: 'Reporter' },
    sourceCollection: 'igem',
    metadata: { organism: 'E. coli' },
    usageCount: 200,
    successRate: 0.95,
  },
  {
    id: 'LAB_KanR',
    label: 'Kanamycin resistance cassette',
    description: 'Aminoglycoside phosphotransferase selection marker.',
    typeHierarchy: { level1: 'Coding', level2: 'Selection Marker' },
    sourceCollection: 'laboratory',
    metadata: { organism: 'E. coli' },
    usageCount: 5,
    successRate: 0.6,
  },
  {
    id: 'ADD_pTet',
    label: 'pTet inducible promoter',
    description: 'Tetracycline-repressible promoter controlled by TetR.',
    typeHierarchy: { level1: 'DNA Elements', level2: 'Regulatory' },
    sourceCollection: 'Addgene',
    metadata: { organism: 'E. coli' },
    usageCount: 40,
    successRate: 0.8,
  },
  {
    id: 'SG_CMV',
    label: 'CMV promoter',
    description: 'Cytomegalovirus immediate early promoter for mammalian expression.',
    typeHierarchy: { level1: 'DNA Elements', level2: 'Regulatory' },
    sourceCollection: 'snapgene',
    metadata: { organism: 'H. sapiens', expressionSystem: 'mammalian' },
  },
];
