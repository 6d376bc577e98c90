// ============================================================================
// Configuration
// ============================================================================

export type DatabaseConfig = {
    readonly host: string;
    readonly port: number;
    readonly user: string;
    readonly password: string;
    readonly database: string;
}

export type ApiConfig = {
    readonly port: number;
}

export type AppConfig = {
    readonly database: DatabaseConfig;
    readonly api: ApiConfig;
}
