export const contractsSchemaId = 'corrective-rag.events/1';
export const contractsVersion = '1.0.0';
