/**
 * rpm spec file for a native plugin package
 */

export const PLUGIN_INSTALL_DIR = '/var/www/plugins';

export interface RpmSpecData {
  /** `<name>-<major.minor>`, also the top-level directory of the source tarball */
  name: string;
  /** Full plugin version, `x.y.z` */
  version: string;
  release: string;
  summary: string;
  description: string;
  license: string;
  homepage: string;
  vendor: string;
  /** Source tarball file name inside SOURCES/ */
  source: string;
  preInstallHook?: string;
  postInstallHook?: string;
  uninstallHook?: string;
}

function scriptlet(section: string, body: string | undefined): string {
  if (body === undefined || body.trim().length === 0) {
    return '';
  }
  return `\n${section}\n${body.replace(/\s+$/, '')}\n`;
}

/** Macros in free text must not be expanded by rpmbuild */
function escapeMacros(text: string): string {
  return text.replace(/%/g, '%%');
}

function singleLine(text: string): string {
  return escapeMacros(text.replace(/\s+/g, ' ').trim());
}

export function renderRpmSpec(data: RpmSpecData): string {
  const installDir = `${PLUGIN_INSTALL_DIR}/${data.name}`;

  return `%define name ${data.name}
%define version ${data.version}
%define release ${data.release}

Name: %{name}
Version: %{version}
Release: %{release}
Summary: ${singleLine(data.summary)}
License: ${singleLine(data.license)}
URL: ${data.homepage}
Vendor: ${singleLine(data.vendor)}
Source0: ${data.source}
Group: Development/Libraries
BuildArch: noarch
AutoReqProv: no

%description
${escapeMacros(data.description.trim() || data.summary)}

%prep
rm -rf %{name}
tar -xzf %{SOURCE0}

%install
mkdir -p %{buildroot}${PLUGIN_INSTALL_DIR}
cp -r %{name} %{buildroot}${PLUGIN_INSTALL_DIR}/
${scriptlet('%pre', data.preInstallHook)}${scriptlet('%post', data.postInstallHook)}${scriptlet('%preun', data.uninstallHook)}
%clean
rm -rf %{buildroot}

%files
${installDir}
`;
}
