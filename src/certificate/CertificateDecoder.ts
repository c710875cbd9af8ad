/**
 * Turns PEM or DER input into {@link CertificateRecord} values.
 *
 * @module certificate/CertificateDecoder
 */

import { RSAPublicKey } from '@peculiar/asn1-rsa';
import { AsnConvert } from '@peculiar/asn1-schema';
import { Certificate } from '@peculiar/asn1-x509';
import {
    AuthorityKeyIdentifierExtension,
    BasicConstraintsExtension,
    ExtendedKeyUsageExtension,
    Extension,
    KeyUsageFlags,
    KeyUsagesExtension,
    SubjectAlternativeNameExtension,
    SubjectKeyIdentifierExtension,
    X509Certificate,
} from '@peculiar/x509';
import { CertificateError, CertificateErrorCode } from '../CertificateError';
import { createLogger } from '../logger';
import { EXTENDED_KEY_USAGE_NAMES, extensionName, PUBLIC_KEY_OID, signatureAlgorithmName } from './oids';
import { formatTimestamp } from './timestamps';
import type { CertificateRecord, ExtensionRecord } from './types';

const logger = createLogger('decoder');

const KEY_USAGE_LABELS: [KeyUsageFlags, string][] = [
    [KeyUsageFlags.digitalSignature, 'Digital Signature'],
    [KeyUsageFlags.nonRepudiation, 'Non Repudiation'],
    [KeyUsageFlags.keyEncipherment, 'Key Encipherment'],
    [KeyUsageFlags.dataEncipherment, 'Data Encipherment'],
    [KeyUsageFlags.keyAgreement, 'Key Agreement'],
    [KeyUsageFlags.keyCertSign, 'Key Cert Sign'],
    [KeyUsageFlags.cRLSign, 'CRL Sign'],
    [KeyUsageFlags.encipherOnly, 'Encipher Only'],
    [KeyUsageFlags.decipherOnly, 'Decipher Only'],
];

/**
 * A decoded PEM section
 */
export interface PemBlock {
    label: string;
    der: Uint8Array;
}

/**
 * Extracts every `-----BEGIN <label>-----` section from a string.
 */
export function decodePemBlocks(pem: string): PemBlock[] {
    const pattern = /-----BEGIN ([A-Z0-9 ]+)-----([\s\S]*?)-----END \1-----/g;
    const out: PemBlock[] = [];
    let match: RegExpExecArray | null;
    while ((match = pattern.exec(pem)) !== null) {
        const base64 = match[2].replace(/\s/g, '');
        out.push({ label: match[1], der: new Uint8Array(Buffer.from(base64, 'base64')) });
    }
    return out;
}

/**
 * Decodes all certificates in a PEM bundle, or a single DER certificate when
 * the input holds no PEM certificate.
 *
 * @throws {CertificateError} `x509-parse` when a certificate cannot be decoded
 */
export function decodeCertificateChain(data: Uint8Array | string): CertificateRecord[] {
    const bytes = typeof data === 'string' ? new Uint8Array(Buffer.from(data, 'latin1')) : data;
    const text = typeof data === 'string' ? data : Buffer.from(data).toString('latin1');

    const certificates: CertificateRecord[] = [];
    for (const block of decodePemBlocks(text)) {
        if (block.label !== 'CERTIFICATE') {
            logger.debug('Skipping PEM block', { label: block.label });
            continue;
        }
        certificates.push(decodeCertificate(block.der));
    }

    if (certificates.length === 0) {
        certificates.push(decodeCertificate(bytes));
    }

    logger.debug('Decoded certificates', { count: certificates.length });
    return certificates;
}

/**
 * Decodes one DER-encoded certificate.
 *
 * @throws {CertificateError} `x509-parse` when the bytes are not a certificate
 */
export function decodeCertificate(der: Uint8Array): CertificateRecord {
    let certificate: X509Certificate;
    let asn: Certificate;
    try {
        certificate = new X509Certificate(new Uint8Array(der));
        asn = AsnConvert.parse(certificate.rawData, Certificate);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new CertificateError(CertificateErrorCode.X509Parse, message, { cause: error });
    }

    const signatureOid = asn.signatureAlgorithm.algorithm;
    const basicConstraints = certificate.getExtension(BasicConstraintsExtension);
    const keyUsages = certificate.getExtension(KeyUsagesExtension);
    const subjectAltNames = certificate.getExtension(SubjectAlternativeNameExtension);

    return {
        subject: certificate.subject,
        issuer: certificate.issuer,
        serialNumber: formatSerialNumber(certificate.serialNumber),
        notBefore: formatTimestamp(certificate.notBefore),
        notAfter: formatTimestamp(certificate.notAfter),
        publicKeyAlgorithm: describePublicKey(asn),
        signatureAlgorithm: signatureAlgorithmName(signatureOid) ?? signatureOid,
        version: asn.tbsCertificate.version + 1,
        extensions: certificate.extensions.map(toExtensionRecord),
        isCA: basicConstraints?.ca ?? false,
        keyUsage: keyUsages ? describeKeyUsage(keyUsages.usages) : undefined,
        subjectAltNames: subjectAltNames ? describeGeneralNames(subjectAltNames) : [],
    };
}

/**
 * Groups a hex serial into space-separated byte pairs
 */
export function formatSerialNumber(hex: string): string {
    const normalized = hex.toLowerCase();
    const padded = normalized.length % 2 === 0 ? normalized : `0${normalized}`;
    return (padded.match(/.{2}/g) ?? []).join(' ');
}

function describePublicKey(asn: Certificate): string {
    const spki = asn.tbsCertificate.subjectPublicKeyInfo;
    switch (spki.algorithm.algorithm) {
        case PUBLIC_KEY_OID.Rsa:
        case PUBLIC_KEY_OID.RsaPss:
            return `RSA (${rsaModulusBits(spki.subjectPublicKey)} bits)`;
        case PUBLIC_KEY_OID.Ec:
            return 'ECDSA';
        case PUBLIC_KEY_OID.Dsa:
            return 'DSA';
        case PUBLIC_KEY_OID.Ed25519:
            return 'Ed25519';
        case PUBLIC_KEY_OID.Ed448:
            return 'Ed448';
        case PUBLIC_KEY_OID.Gost2001:
            return 'GOST R 34.10';
        case PUBLIC_KEY_OID.Gost2012_256:
        case PUBLIC_KEY_OID.Gost2012_512:
            return 'GOST R 34.10-2012';
        default:
            return 'Unknown';
    }
}

function rsaModulusBits(subjectPublicKey: ArrayBuffer): number {
    const modulus = new Uint8Array(AsnConvert.parse(subjectPublicKey, RSAPublicKey).modulus);
    let offset = 0;
    while (offset < modulus.length && modulus[offset] === 0) {
        offset++;
    }
    return (modulus.length - offset) * 8;
}

function describeKeyUsage(usages: number): string {
    return KEY_USAGE_LABELS.filter(([flag]) => (usages & flag) !== 0)
        .map(([, label]) => label)
        .join(', ');
}

function describeGeneralNames(extension: SubjectAlternativeNameExtension): string[] {
    return extension.names.items.map(name => `${name.type.toUpperCase()}:${name.value}`);
}

function colonHex(hex: string): string {
    return formatSerialNumber(hex).replace(/ /g, ':');
}

function describeExtensionValue(extension: Extension): string {
    if (extension instanceof BasicConstraintsExtension) {
        const ca = extension.ca ? 'CA:TRUE' : 'CA:FALSE';
        return extension.pathLength === undefined ? ca : `${ca}, pathlen:${extension.pathLength}`;
    }
    if (extension instanceof KeyUsagesExtension) {
        return describeKeyUsage(extension.usages);
    }
    if (extension instanceof ExtendedKeyUsageExtension) {
        return extension.usages.map(usage => EXTENDED_KEY_USAGE_NAMES[usage] ?? usage).join(', ');
    }
    if (extension instanceof SubjectAlternativeNameExtension) {
        return describeGeneralNames(extension).join(', ');
    }
    if (extension instanceof SubjectKeyIdentifierExtension) {
        return colonHex(extension.keyId);
    }
    if (extension instanceof AuthorityKeyIdentifierExtension && extension.keyId) {
        return `keyid:${colonHex(extension.keyId)}`;
    }
    return Buffer.from(extension.value).toString('hex');
}

function toExtensionRecord(extension: Extension): ExtensionRecord {
    return {
        oid: extension.type,
        name: extensionName(extension.type),
        critical: extension.critical,
        value: describeExtensionValue(extension),
    };
}
