// Payloads that make common UDP services answer

// Standard A query for example.com
const DNS_QUERY = Buffer.from([
  0x12, 0x34, // transaction id
  0x01, 0x00, // flags: recursion desired
  0x00, 0x01, // questions
  0x00, 0x00, // answers
  0x00, 0x00, // authority
  0x00, 0x00, // additional
  0x07, ...Buffer.from('example'),
  0x03, ...Buffer.from('com'),
  0x00,
  0x00, 0x01, // type A
  0x00, 0x01, // class IN
]);

// SNMPv1 GetRequest for sysDescr.0 with community "public"
const SNMP_GET_REQUEST = Buffer.from([
  0x30, 0x26,
  0x02, 0x01, 0x00,
  0x04, 0x06, ...Buffer.from('public'),
  0xa0, 0x19,
  0x02, 0x01, 0x01,
  0x02, 0x01, 0x00,
  0x02, 0x01, 0x00,
  0x30, 0x0e,
  0x30, 0x0c,
  0x06, 0x08, 0x2b, 0x06, 0x01, 0x02, 0x01, 0x01, 0x01, 0x00,
  0x05, 0x00,
]);

// NTPv3 client request: LI 0, VN 3, mode 3, rest zeroed
const NTP_REQUEST = Buffer.concat([Buffer.from([0x1b]), Buffer.alloc(47)]);

const UDP_PAYLOADS: ReadonlyMap<number, Buffer> = new Map([
  [53, DNS_QUERY],
  [123, NTP_REQUEST],
  [161, SNMP_GET_REQUEST],
]);

export function getUdpPayload(port: number): Buffer {
  return UDP_PAYLOADS.get(port) ?? Buffer.alloc(0);
}
