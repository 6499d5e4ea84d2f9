import * as fs from 'fs/promises'
import * as path from 'path'
import { gasStrategyForNetwork, loadNetworks } from '../network-loader'
import { Network } from '../types'

const tmpDir = path.join(process.cwd(), '.tmp-network-loader-tests')

async function writeNetworksYaml(projectRoot: string, yamlContent: string): Promise<void> {
  await fs.mkdir(projectRoot, { recursive: true })
  await fs.writeFile(path.join(projectRoot, 'networks.yaml'), yamlContent, 'utf-8')
}

describe('network-loader rpcUrl token replacement', () => {
  const originalEnv = { ...process.env }

  beforeAll(async () => {
    await fs.mkdir(tmpDir, { recursive: true })
  })

  afterEach(() => {
    process.env = { ...originalEnv }
  })

  afterAll(async () => {
    try {
      await fs.rm(tmpDir, { recursive: true, force: true })
    } catch {}
  })

  test('replaces {{RPC_*}} tokens with env values', async () => {
    const projectRoot = path.join(tmpDir, 'case1')
    process.env.RPC_URL_TOKEN = 'abc123'
    const yaml = `
- name: "TestNet"
  chainId: 123
  rpcUrl: "https://node.example.com/{{RPC_URL_TOKEN}}"
`
    await writeNetworksYaml(projectRoot, yaml)

    const networks = await loadNetworks(projectRoot)
    expect(networks).toHaveLength(1)
    expect(networks[0].rpcUrl).toBe('https://node.example.com/abc123')
  })

  test('leaves non-RPC tokens intact', async () => {
    const projectRoot = path.join(tmpDir, 'case2')
    process.env.SOME_TOKEN = 'should_not_be_used'
    const yaml = `
- name: "TestNet"
  chainId: 123
  rpcUrl: "https://node.example.com/{{SOME_TOKEN}}"
`
    await writeNetworksYaml(projectRoot, yaml)

    const networks = await loadNetworks(projectRoot)
    expect(networks[0].rpcUrl).toBe('https://node.example.com/{{SOME_TOKEN}}')
  })

  test('supports multiple RPC tokens in a single url', async () => {
    const projectRoot = path.join(tmpDir, 'case3')
    process.env.RPC_A = 'A'
    process.env.RPC_B = 'B'
    const yaml = `
- name: "TestNet"
  chainId: 123
  rpcUrl: "https://node.example.com/{{RPC_A}}/path/{{RPC_B}}"
`
    await writeNetworksYaml(projectRoot, yaml)

    const networks = await loadNetworks(projectRoot)
    expect(networks[0].rpcUrl).toBe('https://node.example.com/A/path/B')
  })

  test('trims whitespace within tokens', async () => {
    const projectRoot = path.join(tmpDir, 'case4')
    process.env.RPC_TOKEN = 'XYZ'
    const yaml = `
- name: "TestNet"
  chainId: 123
  rpcUrl: "https://node.example.com/{{  RPC_TOKEN   }}"
`
    await writeNetworksYaml(projectRoot, yaml)

    const networks = await loadNetworks(projectRoot)
    expect(networks[0].rpcUrl).toBe('https://node.example.com/XYZ')
  })

  test('defaults to empty string when RPC token has no matching env var', async () => {
    const projectRoot = path.join(tmpDir, 'case5')
    delete process.env.RPC_MISSING
    const yaml = `
- name: "TestNet"
  chainId: 123
  rpcUrl: "https://node.example.com/{{RPC_MISSING}}"
`
    await writeNetworksYaml(projectRoot, yaml)

    const networks = await loadNetworks(projectRoot)
    expect(networks[0].rpcUrl).toBe('https://node.example.com/')
  })
})

describe('network-loader validation', () => {
  afterAll(async () => {
    try {
      await fs.rm(tmpDir, { recursive: true, force: true })
    } catch {}
  })

  test('returns an empty list when networks.yaml is missing', async () => {
    await expect(loadNetworks(path.join(tmpDir, 'missing'))).resolves.toEqual([])
  })

  test('reads gas settings, keeping wei amounts as decimal strings', async () => {
    const projectRoot = path.join(tmpDir, 'gas')
    const yaml = `
- name: "Mainnet"
  chainId: 1
  rpcUrl: "https://mainnet.example.com"
  gasLimit: 500000
  maxFeePerGas: "30000000000"
  maxPriorityFeePerGas: 1000000000
- name: "Sepolia"
  chainId: 11155111
  rpcUrl: "https://sepolia.example.com"
  gasPrice: "2000000000"
  testnet: true
`
    await writeNetworksYaml(projectRoot, yaml)

    await expect(loadNetworks(projectRoot)).resolves.toEqual([
      {
        name: 'Mainnet',
        chainId: 1,
        rpcUrl: 'https://mainnet.example.com',
        gasLimit: 500000,
        maxFeePerGas: '30000000000',
        maxPriorityFeePerGas: '1000000000'
      },
      {
        name: 'Sepolia',
        chainId: 11155111,
        rpcUrl: 'https://sepolia.example.com',
        gasPrice: '2000000000',
        testnet: true
      }
    ])
  })

  test('rejects entries without the required fields', async () => {
    const projectRoot = path.join(tmpDir, 'invalid-required')
    await writeNetworksYaml(projectRoot, `
- name: "Broken"
  rpcUrl: "https://node.example.com"
`)

    await expect(loadNetworks(projectRoot)).rejects.toThrow('Invalid network configuration found in networks.yaml')
  })

  test('rejects gas prices that are not whole wei amounts', async () => {
    const projectRoot = path.join(tmpDir, 'invalid-gas')
    await writeNetworksYaml(projectRoot, `
- name: "Broken"
  chainId: 1
  rpcUrl: "https://node.example.com"
  gasPrice: "1.5 gwei"
`)

    await expect(loadNetworks(projectRoot)).rejects.toThrow('Invalid network configuration found in networks.yaml')
  })

  test('rejects files that are not a list', async () => {
    const projectRoot = path.join(tmpDir, 'not-a-list')
    await writeNetworksYaml(projectRoot, 'name: Mainnet\n')

    await expect(loadNetworks(projectRoot)).rejects.toThrow(
      'Failed to load or parse networks.yaml: networks.yaml must contain an array of network configurations.'
    )
  })
})

describe('gasStrategyForNetwork', () => {
  const base: Network = { name: 'Test', chainId: 10, rpcUrl: 'https://node.example.com' }

  test('uses legacy defaults when nothing is configured', () => {
    expect(gasStrategyForNetwork(base)).toEqual({
      kind: 'legacy',
      supportsFeeMarket: false,
      gasPrice: 4_100_000_000n,
      gasLimit: 9_000_000n
    })
  })

  test('uses the configured legacy price and limit', () => {
    expect(gasStrategyForNetwork({ ...base, gasPrice: '7', gasLimit: 100 })).toEqual({
      kind: 'legacy',
      supportsFeeMarket: false,
      gasPrice: 7n,
      gasLimit: 100n
    })
  })

  test('uses the fee market when both caps are configured', () => {
    expect(gasStrategyForNetwork({ ...base, maxFeePerGas: '50', maxPriorityFeePerGas: '2', gasPrice: '40' })).toEqual({
      kind: 'fee-market',
      supportsFeeMarket: true,
      chainId: 10n,
      maxFeePerGas: 50n,
      maxPriorityFeePerGas: 2n,
      gasLimit: 9_000_000n,
      gasPrice: 40n
    })
  })

  test('stays on legacy pricing with only one cap', () => {
    expect(gasStrategyForNetwork({ ...base, maxFeePerGas: '50' }).kind).toBe('legacy')
  })
})
