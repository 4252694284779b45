// Static lookup tables for reporting. The parser itself never consults them.

export const LIBRARY_NAMES: Record<number, string> = {
  0: 'ENDF/B',
  1: 'ENDF/A',
  2: 'JEFF',
  3: 'EFF',
  4: 'ENDF/B High Energy',
  5: 'CENDL',
  6: 'JENDL',
  31: 'INDL/V',
  32: 'INDL/A',
  33: 'FENDL',
  34: 'IRDF',
  35: 'BROND',
  36: 'INGDB-90',
  37: 'FENDL/A',
  41: 'BROND',
};

export const FILE_NAMES: Record<number, string> = {
  1: 'General information',
  2: 'Resonance parameters',
  3: 'Reaction cross sections',
  4: 'Angular distributions of secondary particles',
  5: 'Energy distributions of secondary particles',
  6: 'Product energy-angle distributions',
  7: 'Thermal neutron scattering law data',
  8: 'Radioactive decay data',
  9: 'Multiplicities for production of radioactive nuclides',
  10: 'Cross sections for production of radioactive nuclides',
};

export const SECTION_NAMES: Record<number, string> = {
  1: 'Total Cross Section',
  2: 'Elastic Scattering',
  4: 'Inelastic Scattering',
  16: '(n,2n)',
  18: 'Fission',
  102: 'Radiative Capture',
  103: '(n,p)',
  107: '(n,alpha)',
  151: 'Resonance Parameters',
  451: 'Descriptive Data',
  452: 'Total Neutrons per Fission',
  455: 'Delayed Neutron Data',
  456: 'Prompt Neutrons per Fission',
  458: 'Energy Release Due to Fission',
  460: 'Delayed Photon Data',
};

export function libraryName(nlib: number): string | undefined {
  return LIBRARY_NAMES[nlib];
}

export function sectionName(mt: number): string {
  return SECTION_NAMES[mt] ?? `MT=${mt}`;
}

export function fileName(mf: number): string {
  return FILE_NAMES[mf] ?? `MF=${mf}`;
}
