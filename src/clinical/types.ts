/**
 * Clinical input the composer maps onto segment fields. Dates are ISO-8601
 * strings ("1980-04-12" or "2024-01-15T10:30:00"); they are written in
 * local time.
 */

export interface PersonName {
  family: string;
  given?: string;
  middle?: string;
  suffix?: string;
  prefix?: string;
}

export interface Address {
  street?: string;
  otherDesignation?: string;
  city?: string;
  state?: string;
  postalCode?: string;
  country?: string;
}

export interface CodedValue {
  code: string;
  text?: string;
  codingSystem?: string;
}

export interface Provider {
  id?: string;
  family: string;
  given?: string;
}

export interface Patient {
  /** Medical record number */
  id?: string;
  /** Assigning authority for `id` */
  idAuthority?: string;
  name: PersonName;
  birthDate?: string;
  /** Administrative sex code, e.g. "F", "M", "U" */
  sex?: string;
  address?: Address;
  phone?: string;
}

export interface Encounter {
  /** Visit number */
  id?: string;
  /** Patient class code, e.g. "I", "O", "E" */
  patientClass?: string;
  location?: {
    pointOfCare?: string;
    room?: string;
    bed?: string;
    facility?: string;
  };
  attendingDoctor?: Provider;
  admitDate?: string;
  dischargeDate?: string;
}

export interface Order {
  placerOrderNumber?: string;
  fillerOrderNumber?: string;
  /** Order control code, default "NW" */
  orderControl?: string;
  service?: CodedValue;
  orderingProvider?: Provider;
  orderedAt?: string;
}

export interface Observation {
  /** Value type, e.g. "NM", "ST", "CE" */
  valueType?: string;
  identifier: CodedValue;
  value: string;
  units?: string;
  referenceRange?: string;
  abnormalFlag?: string;
  /** Result status, default "F" */
  resultStatus?: string;
  observedAt?: string;
}

export interface Prescription {
  drug: CodedValue;
  amount?: string;
  units?: string;
  dosageForm?: string;
  dispenseAmount?: string;
  refills?: number;
  prescriber?: Provider;
}

export interface ClinicalInput {
  patient: Patient;
  encounter?: Encounter;
  order?: Order;
  observation?: Observation;
  prescription?: Prescription;
}

export type ClinicalInputKind = keyof ClinicalInput;
