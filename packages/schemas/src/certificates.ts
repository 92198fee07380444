import {z} from 'zod';

const CERTIFICATE_BLOCK = /-----BEGIN CERTIFICATE-----[\s\S]+?-----END CERTIFICATE-----/u;
const PRIVATE_KEY_BLOCK = /-----BEGIN (?:RSA |EC |ENCRYPTED )?PRIVATE KEY-----[\s\S]+?-----END (?:RSA |EC |ENCRYPTED )?PRIVATE KEY-----/u;

const normalizePem = (value: string) => {
  const unified = value.replace(/\r\n/gu, '\n').trim();
  return `${unified}\n`;
};

// Public certificate, private key and optional chain, stored opaquely.
export const CertificateMaterialSchema = z
  .string()
  .min(1, {message: 'Certificate material is empty'})
  .refine(value => CERTIFICATE_BLOCK.test(value), {message: 'Certificate material must contain a CERTIFICATE block'})
  .refine(value => PRIVATE_KEY_BLOCK.test(value), {message: 'Certificate material must contain a PRIVATE KEY block'})
  .transform(normalizePem);

export type CertificateMaterial = z.infer<typeof CertificateMaterialSchema>;

export type CertificateReference = {
  certificateId: string;
  path: string;
};
