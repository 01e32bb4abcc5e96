import type { IngestRecord } from './ingest.parse.js';

const JOINT_REPLACEMENT = '470 – MAJOR JOINT REPLACEMENT W/O MCC';
const HEART_FAILURE = '291 – HEART FAILURE AND SHOCK W/O MCC';

const MOUNT_SINAI = {
  providerId: '330123',
  providerName: 'MOUNT SINAI HOSPITAL',
  providerCity: 'NEW YORK',
  providerState: 'NY',
  providerZipCode: '10029',
};

const NYU_LANGONE = {
  providerId: '330124',
  providerName: 'NYU LANGONE HOSPITAL',
  providerCity: 'NEW YORK',
  providerState: 'NY',
  providerZipCode: '10016',
};

/** Loaded when no CSV is available: five New York hospitals, two DRGs. */
export const SAMPLE_RECORDS: readonly IngestRecord[] = Object.freeze([
  {
    ...MOUNT_SINAI,
    msDrgCode: '470',
    msDrgDefinition: JOINT_REPLACEMENT,
    totalDischarges: 150,
    averageCoveredCharges: 85000,
    averageTotalPayments: 25000,
    averageMedicarePayments: 20000,
  },
  {
    ...NYU_LANGONE,
    msDrgCode: '470',
    msDrgDefinition: JOINT_REPLACEMENT,
    totalDischarges: 120,
    averageCoveredCharges: 92000,
    averageTotalPayments: 28000,
    averageMedicarePayments: 22000,
  },
  {
    providerId: '330125',
    providerName: 'LENOX HILL HOSPITAL',
    providerCity: 'NEW YORK',
    providerState: 'NY',
    providerZipCode: '10021',
    msDrgCode: '470',
    msDrgDefinition: JOINT_REPLACEMENT,
    totalDischarges: 80,
    averageCoveredCharges: 78000,
    averageTotalPayments: 22000,
    averageMedicarePayments: 18000,
  },
  {
    providerId: '330126',
    providerName: 'BROOKLYN HOSPITAL CENTER',
    providerCity: 'BROOKLYN',
    providerState: 'NY',
    providerZipCode: '11201',
    msDrgCode: '470',
    msDrgDefinition: JOINT_REPLACEMENT,
    totalDischarges: 60,
    averageCoveredCharges: 65000,
    averageTotalPayments: 18000,
    averageMedicarePayments: 15000,
  },
  {
    providerId: '330127',
    providerName: 'MONTEFIORE MEDICAL CENTER',
    providerCity: 'BRONX',
    providerState: 'NY',
    providerZipCode: '10467',
    msDrgCode: '470',
    msDrgDefinition: JOINT_REPLACEMENT,
    totalDischarges: 90,
    averageCoveredCharges: 72000,
    averageTotalPayments: 20000,
    averageMedicarePayments: 17000,
  },
  {
    ...MOUNT_SINAI,
    msDrgCode: '291',
    msDrgDefinition: HEART_FAILURE,
    totalDischarges: 200,
    averageCoveredCharges: 45000,
    averageTotalPayments: 15000,
    averageMedicarePayments: 12000,
  },
  {
    ...NYU_LANGONE,
    msDrgCode: '291',
    msDrgDefinition: HEART_FAILURE,
    totalDischarges: 180,
    averageCoveredCharges: 48000,
    averageTotalPayments: 16000,
    averageMedicarePayments: 13000,
  },
]);
