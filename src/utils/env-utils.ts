export enum NodeEnv {
    Development = 'dev',
    Production = 'prod',
    Test = 'test',
}

const TRUTHY_STRINGS = ['y', 'yes', 't', 'true', 'on', '1']

export function stringToBoolean(value: unknown): boolean {
    return TRUTHY_STRINGS.includes(String(value).toLowerCase())
}

/** NODE_ENV prefixes win, then DEBUG switches to development, otherwise production. */
export function determineNodeEnv(env: NodeJS.ProcessEnv = process.env): NodeEnv {
    const nodeEnv = env.NODE_ENV?.toLowerCase() ?? ''
    for (const candidate of [NodeEnv.Test, NodeEnv.Development]) {
        if (nodeEnv.startsWith(candidate)) {
            return candidate
        }
    }
    return stringToBoolean(env.DEBUG) ? NodeEnv.Development : NodeEnv.Production
}

export const isTestEnv = (): boolean => determineNodeEnv() === NodeEnv.Test
export const isDevEnv = (): boolean => determineNodeEnv() === NodeEnv.Development
export const isProdEnv = (): boolean => determineNodeEnv() === NodeEnv.Production
