export enum SummaryGroup {
  CLINICAL = 'clinical',
  HOSPITAL = 'hospital',
}
