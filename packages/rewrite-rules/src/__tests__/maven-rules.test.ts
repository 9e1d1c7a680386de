import { describe, it, expect } from 'vitest';
import { loadDependencyTable } from '../dependency-table.js';
import { modernizePom } from '../maven-rules.js';

const table = loadDependencyTable();

const LEGACY_POM = [
  '<?xml version="1.0" encoding="UTF-8"?>',
  '<project>',
  '    <parent>',
  '        <groupId>org.springframework.boot</groupId>',
  '        <artifactId>spring-boot-starter-parent</artifactId>',
  '        <version>2.7.18</version>',
  '    </parent>',
  '    <properties>',
  '        <java.version>11</java.version>',
  '    </properties>',
  '    <dependencies>',
  '        <dependency>',
  '            <groupId>com.fasterxml.jackson.core</groupId>',
  '            <artifactId>jackson-databind</artifactId>',
  '            <version>2.13.0</version>',
  '        </dependency>',
  '    </dependencies>',
  '    <build>',
  '        <plugins>',
  '            <plugin>',
  '                <groupId>org.apache.maven.plugins</groupId>',
  '                <artifactId>maven-compiler-plugin</artifactId>',
  '            </plugin>',
  '        </plugins>',
  '    </build>',
  '</project>',
  '',
].join('\n');

const MODERN_POM = [
  '<?xml version="1.0" encoding="UTF-8"?>',
  '<!-- MODERNIZED by liftkit - Updated to Java 21 and Spring Boot 3.x -->',
  '<project>',
  '    <parent>',
  '        <groupId>org.springframework.boot</groupId>',
  '        <artifactId>spring-boot-starter-parent</artifactId>',
  '        <version>3.2.0</version>',
  '    </parent>',
  '    <properties>',
  '        <java.version>21</java.version>',
  '        <maven.compiler.source>21</maven.compiler.source>',
  '        <maven.compiler.target>21</maven.compiler.target>',
  '    </properties>',
  '    <dependencies>',
  '        <dependency>',
  '            <groupId>com.fasterxml.jackson.core</groupId>',
  '            <artifactId>jackson-databind</artifactId>',
  '            <version>2.15.2</version>',
  '        </dependency>',
  '    </dependencies>',
  '    <build>',
  '        <plugins>',
  '            <plugin>',
  '                <groupId>org.apache.maven.plugins</groupId>',
  '                <artifactId>maven-compiler-plugin</artifactId>',
  '                <version>3.11.0</version>',
  '            </plugin>',
  '        </plugins>',
  '    </build>',
  '</project>',
  '',
].join('\n');

describe('modernizePom', () => {
  it('upgrades the parent, Java level, dependencies and plugins', () => {
    const result = modernizePom(LEGACY_POM, table);

    expect(result.changes).toEqual([
      'Updated parent spring-boot-starter-parent version to 3.2.0',
      'Updated java.version to 21',
      'Added maven.compiler.source property (21)',
      'Added maven.compiler.target property (21)',
      'Updated jackson-databind to 2.15.2',
      'Added maven-compiler-plugin version 3.11.0',
    ]);
    expect(result.content).toBe(MODERN_POM);
  });

  it('leaves an upgraded pom untouched', () => {
    expect(modernizePom(MODERN_POM, table)).toEqual({
      content: MODERN_POM,
      changes: [],
      changed: false,
    });
  });

  it('drops the .RELEASE suffix from the parent version', () => {
    const pom =
      '<parent>\n<artifactId>spring-boot-starter-parent</artifactId>\n<version>2.1.0.RELEASE</version>\n</parent>\n';
    expect(modernizePom(pom, table).content).toBe(
      '<parent>\n<artifactId>spring-boot-starter-parent</artifactId>\n<version>3.2.0</version>\n</parent>\n',
    );
  });

  it('updates existing compiler, encoding and plugin settings', () => {
    const pom = [
      '<properties>',
      '  <maven.compiler.source>1.8</maven.compiler.source>',
      '  <maven.compiler.target>1.8</maven.compiler.target>',
      '  <project.build.sourceEncoding>ISO-8859-1</project.build.sourceEncoding>',
      '  <spring-boot.version>2.7.0</spring-boot.version>',
      '</properties>',
      '<artifactId>spring-boot-maven-plugin</artifactId>',
      '<version>2.7.0</version>',
      '<artifactId>maven-surefire-plugin</artifactId>',
      '<version>2.22.2</version>',
      '',
    ].join('\n');

    const result = modernizePom(pom, table);

    expect(result.changes).toEqual([
      'Updated maven.compiler.source to 21',
      'Updated maven.compiler.target to 21',
      'Updated spring-boot.version to 3.2.0',
      'Updated project.build.sourceEncoding to UTF-8',
      'Updated spring-boot-maven-plugin to 3.2.0',
      'Updated maven-surefire-plugin to 3.1.2',
    ]);
    // No XML declaration, so no comment either
    expect(result.content).toBe(
      [
        '<properties>',
        '  <maven.compiler.source>21</maven.compiler.source>',
        '  <maven.compiler.target>21</maven.compiler.target>',
        '  <project.build.sourceEncoding>UTF-8</project.build.sourceEncoding>',
        '  <spring-boot.version>3.2.0</spring-boot.version>',
        '</properties>',
        '<artifactId>spring-boot-maven-plugin</artifactId>',
        '<version>3.2.0</version>',
        '<artifactId>maven-surefire-plugin</artifactId>',
        '<version>3.1.2</version>',
        '',
      ].join('\n'),
    );
  });
});
