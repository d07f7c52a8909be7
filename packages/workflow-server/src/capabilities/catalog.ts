import type { CapabilityDefinition, CapabilityName } from '@ledgerline/shared'

export const CAPABILITY_CATALOG = {
  ocr: {
    capability: 'ocr',
    backend: 'EXTERNAL',
    summary: 'Extracts text and line items from invoice attachments.',
    tools: [
      { name: 'google_vision', cost: 'high', latency: 'medium', accuracy: 'high', available: true },
      { name: 'tesseract', cost: 'free', latency: 'fast', accuracy: 'medium', available: true },
      { name: 'aws_textract', cost: 'medium', latency: 'medium', accuracy: 'high', available: true }
    ]
  },
  enrichment: {
    capability: 'enrichment',
    backend: 'EXTERNAL',
    summary: 'Looks up vendor tax ids, credit scores and risk ratings.',
    tools: [
      { name: 'clearbit', cost: 'high', latency: 'fast', accuracy: 'high', available: true },
      { name: 'people_data_labs', cost: 'medium', latency: 'fast', accuracy: 'medium', available: true },
      { name: 'vendor_db', cost: 'free', latency: 'very_fast', accuracy: 'medium', available: true }
    ]
  },
  erp_connector: {
    capability: 'erp_connector',
    backend: 'EXTERNAL',
    summary: 'Reads purchase orders and goods receipts, posts approved invoices.',
    tools: [
      { name: 'sap_sandbox', cost: 'free', latency: 'medium', accuracy: 'high', available: true },
      { name: 'netsuite', cost: 'medium', latency: 'medium', accuracy: 'high', available: true },
      { name: 'mock_erp', cost: 'free', latency: 'very_fast', accuracy: 'high', available: true }
    ]
  },
  storage: {
    capability: 'storage',
    backend: 'LOCAL',
    summary: 'Persists raw invoice payloads and attachments.',
    tools: [
      { name: 's3', cost: 'low', latency: 'fast', accuracy: 'high', available: true },
      { name: 'gcs', cost: 'low', latency: 'fast', accuracy: 'high', available: true },
      { name: 'local_fs', cost: 'free', latency: 'very_fast', accuracy: 'high', available: true }
    ]
  },
  db: {
    capability: 'db',
    backend: 'LOCAL',
    summary: 'Records review holds and final workflow outputs.',
    tools: [
      { name: 'postgres', cost: 'medium', latency: 'fast', accuracy: 'high', available: true },
      { name: 'sqlite', cost: 'free', latency: 'very_fast', accuracy: 'high', available: true },
      { name: 'dynamodb', cost: 'low', latency: 'fast', accuracy: 'high', available: false }
    ]
  },
  email: {
    capability: 'email',
    backend: 'EXTERNAL',
    summary: 'Sends vendor and finance team notifications.',
    tools: [
      { name: 'sendgrid', cost: 'medium', latency: 'fast', accuracy: 'high', available: true },
      { name: 'smartlead', cost: 'medium', latency: 'medium', accuracy: 'high', available: false },
      { name: 'ses', cost: 'low', latency: 'fast', accuracy: 'high', available: true }
    ]
  }
} satisfies Record<CapabilityName, CapabilityDefinition>
