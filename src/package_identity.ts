import { DriverConfig } from './config';

export interface PackageIdentity {
    /** Canonical name (PACKAGE). */
    readonly package: string;
    /** Canonical version (PACKAGE_VERSION). */
    readonly packageVersion: string;
    /** Homologated name used for display and file naming (PKG_NAME). */
    readonly name: string;
    /** Homologated version used for display and file naming (PKG_VERSION). */
    readonly version: string;
    readonly parent: string;
    readonly builder: string;
}

export function identityFromConfig(config: DriverConfig): PackageIdentity {
    return Object.freeze({
        package: config.package,
        packageVersion: config.packageVersion,
        name: config.name,
        version: config.version,
        parent: config.parent,
        builder: config.builder,
    });
}

/** Name, version and builder must all be present for a build to run. */
export function isBuildable(identity: PackageIdentity): boolean {
    return identity.package !== '' && identity.packageVersion !== '' && identity.builder !== '';
}

/** `<package>:<version>`, the coordinate the repotag mapping is applied to. */
export function packageId(identity: PackageIdentity): string {
    return `${identity.package}:${identity.packageVersion}`;
}

export function capitalize(value: string): string {
    return value.charAt(0).toUpperCase() + value.slice(1);
}

/** e.g. "Acme Foo 1.2.3", or "Foo 1.2.3" without a parent. */
export function displayName(identity: PackageIdentity): string {
    const parent = identity.parent ? `${capitalize(identity.parent)} ` : '';
    return `${parent}${capitalize(identity.name)} ${identity.version}`;
}
