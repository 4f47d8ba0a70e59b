// src/conn/config.ts

import { DrvError } from '../internal/err';
import { ErrorKind } from '../types/err';

export class Config {
    host = '';
    port = 3306;
    user = '';
    password = '';
    database = '';
    timeout = 2_000; // dial + handshake, ms
    keepAlive = 30_000; // TCP keep-alive initial delay, ms; 0 disables
    readTimeout = 0; // per packet, ms; 0 disables
    autoDrain = false; // drain an unread cursor instead of rejecting the next command
}

export class ConfigBuilder {
    private config = new Config();

    private constructor() { }

    /** Create a new builder with sensible defaults */
    static new(): ConfigBuilder {
        return new ConfigBuilder();
    }

    withHost(host: string): this {
        this.config.host = host.trim();
        return this;
    }

    withPort(port: number): this {
        this.config.port = port;
        return this;
    }

    withUser(user: string): this {
        this.config.user = user;
        return this;
    }

    withPassword(password: string): this {
        this.config.password = password;
        return this;
    }

    withDatabase(database: string): this {
        this.config.database = database.trim();
        return this;
    }

    withTimeout(timeoutMs: number): this {
        this.config.timeout = timeoutMs;
        return this;
    }

    withKeepAlive(keepAliveMs: number): this {
        this.config.keepAlive = keepAliveMs;
        return this;
    }

    withReadTimeout(readTimeoutMs: number): this {
        this.config.readTimeout = readTimeoutMs;
        return this;
    }

    withAutoDrain(autoDrain: boolean): this {
        this.config.autoDrain = autoDrain;
        return this;
    }

    /** Build and validate the config */
    build(): Config {
        const errors = validateConfig(this.config);
        if (errors.length > 0) {
            throw DrvError(`CONFIG_ERROR:Config validation failed:\n  - ${errors.join('\n  - ')}`, ErrorKind.Client);
        }

        return { ...this.config };
    }
}

// validateConfig lists every problem, not just the first one.
export function validateConfig(cfg: Config): string[] {
    const errors: string[] = [];

    if (!cfg.host) {
        errors.push('server address is required');
    }
    if (!Number.isInteger(cfg.port) || cfg.port < 1 || cfg.port > 65535) {
        errors.push(`port must be an integer in 1..65535, got ${cfg.port}`);
    }
    if (!cfg.user) {
        errors.push('user is required');
    }
    if (!(cfg.timeout > 0)) {
        errors.push('timeout must be positive');
    }
    if (cfg.keepAlive < 0) {
        errors.push('keepAlive must not be negative');
    }
    if (cfg.readTimeout < 0) {
        errors.push('readTimeout must not be negative');
    }

    return errors;
}
