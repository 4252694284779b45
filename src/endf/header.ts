import type { RecordReader } from './reader.js';
import type { EvaluationHeader } from './types.js';

/**
 * Reads the descriptive part of MF=1/MT=451: HEAD, three CONT records, three
 * TEXT records and NWD-3 free-text description lines. The cursor is left on
 * the first directory line.
 */
export function readHeaderSection(reader: RecordReader): EvaluationHeader {
  const head = reader.readHead();
  const cont1 = reader.readControl();
  const cont2 = reader.readControl();
  const cont3 = reader.readControl();

  const text1 = reader.readText().text;
  const text2 = reader.readText().text;
  const text3 = reader.readText().text;

  const nwd = cont3.n1;
  const description: string[] = [];
  for (let i = 0; i < nwd - 3; i += 1) {
    description.push(reader.readText().text.trimEnd());
  }

  return {
    mat: head.mat,
    ZA: head.za,
    AWR: head.awr,
    LRP: head.l1,
    LFI: head.l2,
    NLIB: head.n1,
    NMOD: head.n2,
    ELIS: cont1.c1,
    STA: Math.trunc(cont1.c2),
    LIS: cont1.l1,
    LISO: cont1.l2,
    NFOR: cont1.n2,
    AWI: cont2.c1,
    EMAX: cont2.c2,
    LREL: cont2.l1,
    NSUB: cont2.n1,
    NVER: cont2.n2,
    TEMP: cont3.c1,
    LDRV: cont3.l1,
    NWD: nwd,
    NXC: cont3.n2,
    ZSYMAM: text1.slice(0, 11).trim(),
    ALAB: text1.slice(11, 22).trim(),
    EDATE: text1.slice(22, 32).trim(),
    AUTH: text1.slice(32, 66).trim(),
    REF: text2.slice(1, 22).trim(),
    DDATE: text2.slice(22, 32).trim(),
    RDATE: text2.slice(33, 43).trim(),
    ENDATE: text2.slice(55, 63).trim(),
    HSUB: text3.trim(),
    description,
  };
}
