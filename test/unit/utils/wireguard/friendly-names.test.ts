import { parseFriendlyNames } from '@utils/wireguard/friendly-names.js'
import { describe, expect, it } from 'vitest'

const WG0_CONF = `# Note: Do not edit this file directly.
# Your changes will be overwritten!

# Server
[Interface]
PrivateKey = server-private-key
Address = 10.8.0.1/24
ListenPort = 51820

# Client: alice-phone (5f1c1a6e-0000-4000-8000-000000000001)
[Peer]
PublicKey = alicePublicKey=
PresharedKey = shared
AllowedIPs = 10.8.0.2/32

# Client: Bob's Laptop (5f1c1a6e-0000-4000-8000-000000000002)
[Peer]
PublicKey=bobPublicKey=
AllowedIPs = 10.8.0.3/32

[Peer]
PublicKey = orphanKey=
AllowedIPs = 10.8.0.4/32
`

describe('parseFriendlyNames', () => {
  it('should map public keys to the preceding client comment', () => {
    const { names } = parseFriendlyNames(WG0_CONF)
    expect(names).toEqual(
      new Map([
        ['alicePublicKey=', 'alice-phone'],
        ['bobPublicKey=', "Bob's Laptop"],
      ]),
    )
  })

  it('should report keys without a client comment', () => {
    const { unnamedKeys } = parseFriendlyNames(WG0_CONF)
    expect(unnamedKeys).toEqual(['orphanKey='])
  })

  it('should bind a client name to one public key only', () => {
    const { names, unnamedKeys } = parseFriendlyNames(
      '# Client: once (id)\nPublicKey = first=\nPublicKey = second=\n',
    )
    expect(names).toEqual(new Map([['first=', 'once']]))
    expect(unnamedKeys).toEqual(['second='])
  })

  it('should ignore client comments without an id suffix', () => {
    const { names } = parseFriendlyNames('# Client: nameless\nPublicKey = k=\n')
    expect(names.size).toBe(0)
  })

  it('should handle CRLF line endings', () => {
    const { names } = parseFriendlyNames('# Client: win (1)\r\nPublicKey = w=\r\n')
    expect(names.get('w=')).toBe('win')
  })
})
